import { describe, it, expect } from 'vitest';
import { resolve } from 'path';
import { loadRuntimeConfig } from '../env.js';

describe('loadRuntimeConfig', () => {
  it('applies defaults', () => {
    expect(loadRuntimeConfig({})).toEqual({
      kb_path: resolve(process.cwd(), 'data/guidelines.json'),
      synonyms_path: resolve(process.cwd(), 'data/synonyms.json'),
      port: 3001,
    });
  });

  it('reads overrides', () => {
    expect(
      loadRuntimeConfig({ KB_PATH: 'guidelines.db', ENABLE_SYNONYMS: 'false', PORT: '8080' })
    ).toEqual({
      kb_path: resolve(process.cwd(), 'guidelines.db'),
      synonyms_path: null,
      port: 8080,
    });
  });

  it('rejects an invalid port', () => {
    expect(() => loadRuntimeConfig({ PORT: 'abc' })).toThrow(/^Invalid environment configuration: PORT/);
  });
});
