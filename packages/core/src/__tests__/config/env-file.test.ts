import { describe, it, expect } from 'vitest';
import {
  parseEnvFile,
  serializeEnvFile,
  generateSecretKey,
  toStackEnv,
  createDefaultEnv,
} from '../../config/env-file.js';

describe('env file', () => {
  it('parses keys, skipping comments and blank lines', () => {
    const entries = parseEnvFile([
      '# stack settings',
      '',
      'PROJECT_NAME=mystack',
      'export WEBUI_SECRET_KEY="test-secret"',
      "GREETING='hello world'",
      'not a pair',
    ].join('\n'));

    expect(entries).toEqual({
      PROJECT_NAME: 'mystack',
      WEBUI_SECRET_KEY: 'test-secret',
      GREETING: 'hello world',
    });
  });

  it('quotes values that need it when serializing', () => {
    expect(serializeEnvFile({ PROJECT_NAME: 'mystack', GREETING: 'hello world' }))
      .toBe('PROJECT_NAME=mystack\nGREETING="hello world"\n');
  });

  it('generates a 64 character hex secret by default', () => {
    const secret = generateSecretKey();

    expect(secret).toMatch(/^[0-9a-f]{64}$/);
    expect(generateSecretKey()).not.toBe(secret);
  });

  it('defaults the project name when it is missing or blank', () => {
    expect(toStackEnv({}).projectName).toBe('modelstack');
    expect(toStackEnv({ PROJECT_NAME: '  ' }).projectName).toBe('modelstack');
    expect(toStackEnv({ PROJECT_NAME: 'lab' }).projectName).toBe('lab');
  });

  it('creates default entries with a fresh secret', () => {
    const entries = createDefaultEnv('lab');

    expect(entries.PROJECT_NAME).toBe('lab');
    expect(entries.WEBUI_SECRET_KEY).toMatch(/^[0-9a-f]{64}$/);
  });
});
