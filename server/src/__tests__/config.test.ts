import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({ port: 8787, corsOrigin: '*' });
  });

  it('reads PORT and CORS_ORIGIN', () => {
    expect(loadConfig({ PORT: '3000', CORS_ORIGIN: 'http://localhost:5173' })).toEqual({
      port: 3000,
      corsOrigin: 'http://localhost:5173',
    });
  });

  it('rejects a PORT that is not a port number', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('PORT must be an integer between 0 and 65535, got "eighty"');
    expect(() => loadConfig({ PORT: '70000' })).toThrow(Error);
  });
});
