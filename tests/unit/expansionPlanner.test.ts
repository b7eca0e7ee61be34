import {
  ExpansionPlanner,
  isBlacklisted,
  matchFallbackLabel,
  parseBulletLabels,
} from '../../src/core/planning/expansionPlanner';
import { ExtractionError } from '../../src/core/errors';
import { DEFAULT_PIPELINE_CONFIG } from '../../src/config/defaults';
import { ScriptedLlm, silentLogger } from '../helpers/fakes';

const cfg = DEFAULT_PIPELINE_CONFIG.planner;

describe('parseBulletLabels', () => {
  it('reads *, • and - bullets in order', () => {
    expect(parseBulletLabels('Found these:\n* Read More\n• See More\n- Show more')).toEqual([
      'Read More',
      'See More',
      'Show more',
    ]);
  });

  it('strips arrow tails and wrapping marks', () => {
    expect(parseBulletLabels('* See more —>\n* "Show More"\n* **Read more**')).toEqual([
      'See more',
      'Show More',
      'Read more',
    ]);
  });
});

describe('isBlacklisted', () => {
  it('matches terms as case-insensitive substrings', () => {
    expect(isBlacklisted('COOKIE preferences', cfg.blacklist)).toBe(true);
    expect(isBlacklisted('View Job', cfg.blacklist)).toBe(true);
    expect(isBlacklisted('See more', cfg.blacklist)).toBe(false);
  });
});

describe('matchFallbackLabel', () => {
  it('only accepts a whole line from the vocabulary', () => {
    expect(matchFallbackLabel('I think:\n  show more  ', cfg.fallbackLabels)).toBe('show more');
    expect(matchFallbackLabel('Click Show More to continue', cfg.fallbackLabels)).toBeNull();
  });
});

describe('ExpansionPlanner', () => {
  it('picks the first bullet that survives the blacklist', async () => {
    const reply = '- Read More\n- See More\n- Get Started';
    const llm = new ScriptedLlm([reply]);
    const planner = new ExpansionPlanner(llm, cfg, silentLogger);

    expect(planner.candidates(reply)).toEqual(['Read More', 'See More']);
    await expect(planner.propose('Senior Engineer ... Read More')).resolves.toBe('Read More');
    expect(llm.prompts).toHaveLength(1);
    expect(llm.prompts[0]).toContain('Senior Engineer ... Read More');
  });

  it('never proposes a blacklisted caption', async () => {
    const llm = new ScriptedLlm(['* Accept Cookies\n* Privacy Settings\n* Show more details']);
    const planner = new ExpansionPlanner(llm, cfg, silentLogger);
    await expect(planner.propose('page text')).resolves.toBe('Show more details');
  });

  it('returns null when every bullet is blacklisted and no fallback line exists', async () => {
    const planner = new ExpansionPlanner(new ScriptedLlm(['* Cookie settings\n* Dismiss']), cfg, silentLogger);
    await expect(planner.propose('page text')).resolves.toBeNull();
  });

  it('falls back to a known caption given without a bullet', async () => {
    const planner = new ExpansionPlanner(new ScriptedLlm(['Read More']), cfg, silentLogger);
    await expect(planner.propose('page text')).resolves.toBe('Read More');
  });

  it('returns null for the no-candidate answer', async () => {
    const planner = new ExpansionPlanner(new ScriptedLlm(['no button found']), cfg, silentLogger);
    await expect(planner.propose('page text')).resolves.toBeNull();
  });

  it('does not treat a bulleted no-candidate answer as a caption', async () => {
    const planner = new ExpansionPlanner(new ScriptedLlm(['- No button found.']), cfg, silentLogger);
    expect(planner.candidates('- No button found.')).toEqual([]);
    await expect(planner.propose('page text')).resolves.toBeNull();
  });

  it('treats a model failure as no proposal', async () => {
    const llm = new ScriptedLlm([new ExtractionError('LLMCommunicationError', 'LLM invocation error: 503')]);
    const planner = new ExpansionPlanner(llm, cfg, silentLogger);
    await expect(planner.propose('page text')).resolves.toBeNull();
  });
});
