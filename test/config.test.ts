/**
 * Configuration Tests
 * Run with: npx tsx --test test/config.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigError, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    assert.deepEqual(loadConfig({}), {
      apiKey: '',
      apiBase: 'https://api.manus.im/v1',
      agentProfile: 'manus-1.6',
      port: 8000,
      transport: 'http'
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      MANUS_API_KEY: 'test-secret',
      MANUS_API_BASE: 'https://manus.test/v2',
      MANUS_AGENT_PROFILE: 'manus-1.6-max',
      PORT: '9100',
      MCP_TRANSPORT: 'stdio'
    });
    assert.deepEqual(config, {
      apiKey: 'test-secret',
      apiBase: 'https://manus.test/v2',
      agentProfile: 'manus-1.6-max',
      port: 9100,
      transport: 'stdio'
    });
  });

  it('trims trailing slashes from the base URL', () => {
    assert.equal(loadConfig({ MANUS_API_BASE: 'https://manus.test/v1//' }).apiBase, 'https://manus.test/v1');
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ PORT: '', MANUS_AGENT_PROFILE: '' });
    assert.equal(config.port, 8000);
    assert.equal(config.agentProfile, 'manus-1.6');
  });

  it('returns a frozen object', () => {
    assert.ok(Object.isFrozen(loadConfig({})));
  });

  it('rejects invalid values with one issue per variable', () => {
    assert.throws(
      () => loadConfig({ PORT: 'eighty', MCP_TRANSPORT: 'carrier-pigeon', MANUS_API_BASE: 'not a url' }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.equal(err.issues.length, 3);
        assert.ok(err.issues.some(issue => issue.startsWith('PORT:')));
        assert.ok(err.issues.some(issue => issue.startsWith('MCP_TRANSPORT:')));
        assert.ok(err.issues.some(issue => issue.startsWith('MANUS_API_BASE:')));
        return true;
      }
    );
  });
});
