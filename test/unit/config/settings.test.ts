import { describe, it, expect } from 'vitest';
import { loadSettings } from '@/config/settings.js';

describe('loadSettings', () => {
  it('should fall back to defaults', () => {
    expect(loadSettings({})).toEqual({
      baseUrl: 'https://forebears.io',
      userAgent: 'forename-atlas/1.0',
      timeoutMs: 30000,
      geojsonPath: null,
      joinProperty: 'ISO_A3_EH',
    });
  });

  it('should read overrides from the environment', () => {
    const settings = loadSettings({
      NAME_ATLAS_BASE_URL: 'https://names.example/',
      NAME_ATLAS_USER_AGENT: 'test-agent/0.1',
      NAME_ATLAS_TIMEOUT_MS: '5000',
      NAME_ATLAS_GEOJSON: 'maps/countries.geojson',
      NAME_ATLAS_JOIN_PROPERTY: 'ADM0_A3',
    });

    expect(settings).toEqual({
      baseUrl: 'https://names.example',
      userAgent: 'test-agent/0.1',
      timeoutMs: 5000,
      geojsonPath: 'maps/countries.geojson',
      joinProperty: 'ADM0_A3',
    });
  });

  it('should ignore an invalid timeout', () => {
    expect(loadSettings({ NAME_ATLAS_TIMEOUT_MS: 'soon' }).timeoutMs).toBe(30000);
    expect(loadSettings({ NAME_ATLAS_TIMEOUT_MS: '-1' }).timeoutMs).toBe(30000);
  });
});
