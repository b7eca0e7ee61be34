import {
  collapseEscapedKeyQuotes,
  normalizeLiteral,
  parseJsonObject,
  quoteBareKeys,
  removeTrailingCommas,
  repairJson,
  repairJsonText,
  stripDigitGroupCommas,
  type RepairStage,
} from '../../src/core/synthesis/jsonRepair';

describe('repairJson', () => {
  it('accepts valid JSON as is', () => {
    expect(repairJson('{"title": "Dev"}')).toEqual({
      stage: 'direct',
      text: '{"title": "Dev"}',
      data: { title: 'Dev' },
    });
  });

  it('pulls the object out of surrounding prose', () => {
    const result = repairJson('Sure! Here is the data:\n{"title": "Dev"}\nLet me know.');
    expect(result?.stage).toBe('object-block');
    expect(result?.data).toEqual({ title: 'Dev' });
  });

  it('removes thousands separators inside numbers', () => {
    const result = repairJson('{"title": "Engineer", "years": 3,500}');
    expect(result).toEqual({
      stage: 'syntax-cleanup',
      text: '{"title": "Engineer", "years": 3500}',
      data: { title: 'Engineer', years: 3500 },
    });
  });

  it('reads a whole reply written as an object literal', () => {
    expect(repairJson("{'title': 'Engineer', 'years': 3}")).toEqual({
      stage: 'direct',
      text: '{"title":"Engineer","years":3}',
      data: { title: 'Engineer', years: 3 },
    });
    expect(repairJson('{title: "Dev", level: 2,}')?.text).toBe('{"title":"Dev","level":2}');
  });

  it('quotes bare keys and drops trailing commas inside surrounding prose', () => {
    const result = repairJson('Output: {title: "Dev", level: 2,}');
    expect(result?.stage).toBe('syntax-cleanup');
    expect(result?.text).toBe('{"title": "Dev", "level": 2}');
    expect(result?.data).toEqual({ title: 'Dev', level: 2 });
  });

  it('unescapes quotes around keys', () => {
    const result = repairJson('{\\"company\\": "Acme"}');
    expect(result?.stage).toBe('key-escapes');
    expect(result?.data).toEqual({ company: 'Acme' });
  });

  it('returns null when nothing parses to an object', () => {
    expect(repairJson('no json here')).toBeNull();
    expect(repairJson('[1, 2]')).toBeNull();
    expect(repairJson('{"title": }')).toBeNull();
  });

  it('returns the same text when run on its own output', () => {
    const once = repairJsonText('Result: {title: "Engineer", "years": 3,500,}');
    expect(once).toBe('{"title": "Engineer", "years": 3500}');
    expect(repairJsonText(once ?? '')).toBe(once);
  });

  it('stops at a stage that cannot produce a candidate', () => {
    const seen: string[] = [];
    const stages: RepairStage[] = [
      { name: 'give-up', apply: () => null },
      {
        name: 'never-reached',
        apply: (input) => {
          seen.push(input);
          return input;
        },
      },
    ];
    expect(repairJson('{"a": 1}', stages)).toBeNull();
    expect(seen).toEqual([]);
  });
});

describe('repair stages', () => {
  it('are idempotent on their own output', () => {
    const inputs = ['[1,2,,]', '{a: 1, b: 2}', 'salary 120,000', '{\\"a\\": 1}', "{'a': 'x'}"];
    const stages = [normalizeLiteral, removeTrailingCommas, quoteBareKeys, stripDigitGroupCommas, collapseEscapedKeyQuotes];
    for (const stage of stages) {
      for (const input of inputs) {
        const once = stage(input);
        expect(stage(once)).toBe(once);
      }
    }
  });

  it('apply the expected edits', () => {
    expect(removeTrailingCommas('[1,2,,]')).toBe('[1,2]');
    expect(quoteBareKeys('{a: 1, b: 2}')).toBe('{"a": 1, "b": 2}');
    expect(stripDigitGroupCommas('salary 120,000')).toBe('salary 120000');
    expect(collapseEscapedKeyQuotes('{\\"a\\": 1}')).toBe('{"a": 1}');
  });
});

describe('parseJsonObject', () => {
  it('keeps nested values', () => {
    expect(parseJsonObject('{"skills": ["ts", "sql"], "remote": true, "salary": null}')).toEqual({
      skills: ['ts', 'sql'],
      remote: true,
      salary: null,
    });
  });

  it('rejects non-objects', () => {
    expect(parseJsonObject('"text"')).toBeNull();
    expect(parseJsonObject('42')).toBeNull();
  });
});
