import { validateEnv } from './env.schema';

describe('validateEnv', () => {
  const required = { OPENAI_API_KEY: 'test-key', TELEGRAM_BOT_TOKEN: 'test-token' };

  it('applies defaults', () => {
    const env = validateEnv(required);

    expect(env.PORT).toBe(3000);
    expect(env.OPENAI_MODEL).toBe('gpt-4o-mini');
    expect(env.LLM_MAX_CONCURRENCY).toBe(5);
    expect(env.HISTORY_WINDOW).toBe(20);
    expect(env.LLM_RESTATE_RESULTS).toBe(false);
    expect(env.NOTION_API_VERSION).toBe('2022-06-28');
    expect(env.NOTION_CLIENT_ID).toBeUndefined();
  });

  it('coerces numbers and flags from strings', () => {
    const env = validateEnv({ ...required, LLM_TIMEOUT_MS: '5000', TELEGRAM_USE_POLLING: 'true', NOTION_CLIENT_ID: '  ' });

    expect(env.LLM_TIMEOUT_MS).toBe(5000);
    expect(env.TELEGRAM_USE_POLLING).toBe(true);
    expect(env.NOTION_CLIENT_ID).toBeUndefined();
  });

  it('lists every invalid variable', () => {
    expect(() => validateEnv({ LLM_MAX_CONCURRENCY: '50' })).toThrow(
      /OPENAI_API_KEY[\s\S]*LLM_MAX_CONCURRENCY[\s\S]*TELEGRAM_BOT_TOKEN/,
    );
  });
});
