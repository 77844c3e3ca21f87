import { describe, it, expect } from 'vitest';
import {
  AliasNameSchema,
  OverrideEntrySchema,
  SettingsSchema,
  SETTINGS_KEYS,
} from '../../../src/config/schema.js';

describe('AliasNameSchema', () => {
  it('accepts MAJOR.MINOR.PATCH', () => {
    for (const alias of ['3.12.2', '3.13.11', '0.0.0']) {
      expect(AliasNameSchema.safeParse(alias).success).toBe(true);
    }
  });

  it('rejects anything else', () => {
    for (const alias of ['3.12', 'v3.12.2', '3.12.2rc1', '3.12.2 ', '']) {
      expect(AliasNameSchema.safeParse(alias).success).toBe(false);
    }
  });
});

describe('OverrideEntrySchema', () => {
  it('accepts an id or an absolute path as target', () => {
    expect(OverrideEntrySchema.safeParse({ alias: '3.12.2', target: 'uv-cpython-3.12.2-b' }).success).toBe(true);
    expect(OverrideEntrySchema.safeParse({ alias: '3.12.2', target: '/opt/python/3.12.2' }).success).toBe(true);
  });

  it('rejects empty targets and embedded delimiters', () => {
    expect(OverrideEntrySchema.safeParse({ alias: '3.12.2', target: '' }).success).toBe(false);
    expect(OverrideEntrySchema.safeParse({ alias: '3.12.2', target: 'a\tb' }).success).toBe(false);
    expect(OverrideEntrySchema.safeParse({ alias: '3.12.2', target: 'a\nb' }).success).toBe(false);
  });
});

describe('SettingsSchema', () => {
  it('accepts an empty document', () => {
    expect(SettingsSchema.parse({})).toEqual({});
  });

  it('coerces the probe timeout to a number', () => {
    expect(SettingsSchema.parse({ probe_timeout_ms: '2500' })).toEqual({ probe_timeout_ms: 2500 });
  });

  it('treats blank keys as unset', () => {
    const parsed = SettingsSchema.parse({ probe_timeout_ms: null, prefix: null });
    expect(parsed.probe_timeout_ms).toBeUndefined();
    expect(parsed.prefix).toBeUndefined();
  });

  it('accepts the rehash command as a string or a list', () => {
    expect(SettingsSchema.safeParse({ rehash_command: 'pyenv rehash' }).success).toBe(true);
    expect(SettingsSchema.safeParse({ rehash_command: ['pyenv', 'rehash'] }).success).toBe(true);
    expect(SettingsSchema.safeParse({ rehash_command: [] }).success).toBe(false);
  });

  it('rejects a prefix containing a path separator', () => {
    expect(SettingsSchema.safeParse({ prefix: 'uv/' }).success).toBe(false);
  });

  it('exposes its keys', () => {
    expect(SETTINGS_KEYS).toEqual(['prefix', 'managed_root', 'probe_timeout_ms', 'rehash_command']);
  });
});
