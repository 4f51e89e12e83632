import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { projectConfigSchema, validateConfig } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('projectConfigSchema', () => {
  it('fills every default from an empty object', () => {
    expect(projectConfigSchema.parse({})).toEqual(DEFAULT_CONFIG);
  });

  it('accepts the default config', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
  });

  it('defaults agent args to an empty list', () => {
    const config = validateConfig({ agents: { ask: { command: 'helper' } } });
    expect(config.agents.ask).toEqual({ command: 'helper', args: [] });
  });

  it('rejects unknown agent types', () => {
    expect(() => validateConfig({ agents: { reviewer: { command: 'x' } } })).toThrow(ConfigError);
  });

  it('rejects an empty agent command', () => {
    expect(() => validateConfig({ agents: { coder: { command: '' } } })).toThrow(
      'Invalid configuration: agents.coder.command: String must contain at least 1 character(s)',
    );
  });

  it('rejects non-positive timeouts', () => {
    expect(() => validateConfig({ engine: { agentTimeoutSec: 0 } })).toThrow(
      'Invalid configuration: engine.agentTimeoutSec: Number must be greater than 0',
    );
  });

  it('flags an agent timeout far above the engine timeout', () => {
    try {
      validateConfig({ engine: { agentTimeoutSec: 10 }, agents: { coder: { command: 'c', timeout: 101 } } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.field).toBe('agents.coder.timeout');
        expect(err.message).toBe(
          'Invalid configuration: agents.coder.timeout: Timeout 101s for "coder" is more than ten times engine.agentTimeoutSec (10s)',
        );
      }
    }
  });

  it('allows an agent timeout up to ten times the engine timeout', () => {
    const config = validateConfig({ engine: { agentTimeoutSec: 10 }, agents: { coder: { command: 'c', timeout: 100 } } });
    expect(config.agents.coder?.timeout).toBe(100);
  });
});
