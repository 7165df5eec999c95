import { describe, it, expect } from 'vitest';
import { PROFILE_OPTIONS, profileFromOptions } from '../../../src/discord/commands/user/profile';
import { MAX_PLAN_POSTS, MIN_PLAN_POSTS, defaultPlanCount } from '../../../src/discord/commands/user/plan';
import { describeOutcome } from '../../../src/discord/commands/admin/model';
import { commandPayloads } from '../../../src/discord/interactions';
import { ModelUnavailableError } from '../../../src/utils/errors';

describe('/profile', () => {
  it('reads every field from its option and clears omitted ones', () => {
    const given: Record<string, string> = { company_name: '  Acme  ', tone: 'Warm' };

    const profile = profileFromOptions((option) => given[option] ?? null);

    expect(profile).toEqual({
      companyName: 'Acme',
      companyDescription: '',
      targetAudience: '',
      toneOfVoice: 'Warm',
      brandValues: '',
      keyMessages: ''
    });
  });

  it('uses distinct option names', () => {
    const names = Object.values(PROFILE_OPTIONS);
    expect(new Set(names).size).toBe(names.length);
  });
});

describe('/plan', () => {
  it('defaults to seven posts for a week and fifteen for a month', () => {
    expect(defaultPlanCount('week')).toBe(7);
    expect(defaultPlanCount('month')).toBe(15);
    expect(defaultPlanCount('month')).toBeGreaterThanOrEqual(MIN_PLAN_POSTS);
    expect(defaultPlanCount('month')).toBeLessThanOrEqual(MAX_PLAN_POSTS);
  });
});

describe('/model', () => {
  it('shows the resolved model and how it was found', () => {
    const json = describeOutcome('gemini', {
      ok: true,
      handle: { modelId: 'gemini-2.5-flash', generate: async () => '' },
      strategy: 'direct-fallback',
      attempts: [
        { strategy: 'direct-fallback', modelId: 'gemini-2.5-pro', error: 'unknown model' },
        { strategy: 'direct-fallback', modelId: 'gemini-2.5-flash' }
      ]
    }).toJSON();

    expect(json.description).toBe('**Provider:** gemini');
    expect(json.fields).toEqual([
      { name: 'Model', value: 'gemini-2.5-flash', inline: true },
      { name: 'Strategy', value: 'direct-fallback', inline: true },
      { name: 'Failed attempts', value: '1', inline: true }
    ]);
  });

  it('explains why no model is available', () => {
    const json = describeOutcome('openai', {
      ok: false,
      error: new ModelUnavailableError(['gpt-4o']),
      attempts: []
    }).toJSON();

    expect(json.title).toBe('❌ No model available');
    expect(json.description).toBe('**Provider:** openai\n**Reason:** No usable model found (tried: gpt-4o)');
  });
});

describe('command registry', () => {
  it('offers every platform, length and period as a choice', () => {
    const choiceValues = (command: string, option: string) => {
      const payload = commandPayloads().find((c) => c.name === command);
      const found = payload?.options?.find((o) => o.name === option);
      const choices: unknown = found && 'choices' in found ? found.choices : undefined;
      return Array.isArray(choices) ? choices.map((c: { value: string }) => c.value) : undefined;
    };

    expect(choiceValues('post', 'platform')).toEqual(['instagram', 'facebook', 'telegram', 'blog']);
    expect(choiceValues('post', 'length')).toEqual(['short', 'medium', 'long']);
    expect(choiceValues('plan', 'period')).toEqual(['week', 'month']);
  });

  it('registers every slash command once', () => {
    expect(commandPayloads().map((c) => c.name).sort()).toEqual(['ideas', 'model', 'plan', 'post', 'profile']);
  });
});
