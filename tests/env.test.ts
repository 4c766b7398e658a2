import { describe, it, expect } from 'vitest';
import { resolveLeyningEnv } from '../config/env';
import { ConfigError } from '../src/leyning/errors';
import { DEFAULT_OFFICIANT } from '../src/leyning/layout';
import { buildParshaReport } from '../src/leyning/report';

describe('resolveLeyningEnv', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(resolveLeyningEnv({})).toEqual({
      leyningUrl: 'https://www.hebcal.com/leyning',
      credentialsFile: 'credentials.json',
      sheetsDelayMs: 1000,
      officiant: 'Rabbi',
    });
  });

  it('reads and trims overrides', () => {
    const config = resolveLeyningEnv({
      HEBCAL_LEYNING_URL: ' https://example.test/leyning ',
      GOOGLE_APPLICATION_CREDENTIALS: '/secrets/service-account.json',
      GOOGLE_CLIENT_EMAIL: 'robot@example.test',
      GOOGLE_PRIVATE_KEY: 'test-secret',
      SHEETS_DELAY_MS: '250',
      LEYNING_OFFICIANT: 'Cantor',
    });
    expect(config).toEqual({
      leyningUrl: 'https://example.test/leyning',
      credentialsFile: '/secrets/service-account.json',
      clientEmail: 'robot@example.test',
      privateKey: 'test-secret',
      sheetsDelayMs: 250,
      officiant: 'Cantor',
    });
  });

  it('accepts the older credentials variable and treats blanks as unset', () => {
    const config = resolveLeyningEnv({ GOOGLE_CREDENTIALS_FILE: 'creds.json', LEYNING_OFFICIANT: '   ' });
    expect(config.credentialsFile).toBe('creds.json');
    expect(config.officiant).toBe('Rabbi');
  });

  it('rejects values it cannot use', () => {
    expect(() => resolveLeyningEnv({ SHEETS_DELAY_MS: 'soon' })).toThrow(ConfigError);
    expect(() => resolveLeyningEnv({ HEBCAL_LEYNING_URL: 'not a url' })).toThrow(ConfigError);
    expect(() => resolveLeyningEnv({ SHEETS_DELAY_MS: '-5' })).toThrow(/sheetsDelayMs/);
  });

  it('shares the default officiant label with the report', () => {
    const officiant = resolveLeyningEnv({}).officiant;
    expect(officiant).toBe(DEFAULT_OFFICIANT);
    const report = buildParshaReport({ name: { en: 'Noach' }, date: '2024-11-09', hdate: '8 Cheshvan 5785' });
    expect(report.rows[1].cells[0]).toBe(officiant);
  });

  it('needs the service account email alongside a private key', () => {
    expect(() => resolveLeyningEnv({ GOOGLE_PRIVATE_KEY: 'test-secret' })).toThrow(
      'GOOGLE_PRIVATE_KEY is set but GOOGLE_CLIENT_EMAIL is missing',
    );
  });
});
