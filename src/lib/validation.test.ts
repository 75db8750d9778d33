// Path: src/lib/validation.test.ts
// Unit tests for InboundConfig validation

import { describe, it, expect } from 'vitest';
import {
  parseInboundConfig,
  formatValidationResult,
  assertValidName,
  assertValidUuid,
} from './validation.js';
import { isEngineError } from '../utils/error.js';

function realityDocument(overrides: Record<string, unknown> = {}) {
  return {
    log: { loglevel: 'warning' },
    inbounds: [
      {
        port: 443,
        protocol: 'vless',
        settings: {
          clients: [
            { id: '11111111-2222-4333-8444-555555555555', email: 'alice', flow: 'xtls-rprx-vision', level: 0 },
          ],
          decryption: 'none',
        },
        streamSettings: {
          network: 'tcp',
          security: 'reality',
          realitySettings: {
            dest: 'addons.mozilla.org:443',
            privateKey: 'test-private-key',
            shortIds: ['0123abcd'],
            serverNames: ['addons.mozilla.org'],
          },
        },
        ...overrides,
      },
      { tag: 'api', protocol: 'dokodemo-door' },
    ],
  };
}

describe('parseInboundConfig', () => {
  it('should accept a valid Reality document', () => {
    const { config, result } = parseInboundConfig(realityDocument());
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.warnings).toHaveLength(0);
    expect(config?.inbounds[0].port).toBe(443);
  });

  it('should carry unknown fields through', () => {
    const { config } = parseInboundConfig(realityDocument());
    expect(config?.log).toEqual({ loglevel: 'warning' });
    expect(config?.inbounds[1]).toEqual({ tag: 'api', protocol: 'dokodemo-door' });
    expect(config?.inbounds[0].settings.clients[0].level).toBe(0);
    expect(config?.inbounds[0].streamSettings.realitySettings?.dest).toBe('addons.mozilla.org:443');
  });

  it('should fail for a document without inbounds', () => {
    const { config, result } = parseInboundConfig({ inbounds: [] });
    expect(config).toBeNull();
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{ field: 'inbounds', message: 'At least one inbound is required', value: [] }]);
  });

  it('should fail for a non-object document', () => {
    const { result } = parseInboundConfig('not json');
    expect(result.errors[0].message).toBe('Document must be a JSON object');
  });

  it('should fail for an out-of-range port', () => {
    const { config, result } = parseInboundConfig(realityDocument({ port: 70000 }));
    expect(config).toBeNull();
    expect(result.errors.map((e) => e.field)).toEqual(['inbounds[0].port']);
  });

  it('should reject duplicate client names', () => {
    const doc = realityDocument({
      settings: {
        clients: [
          { id: '11111111-2222-4333-8444-555555555555', email: 'alice', flow: 'xtls-rprx-vision' },
          { id: '66666666-2222-4333-8444-555555555555', email: 'alice', flow: 'xtls-rprx-vision' },
        ],
      },
    });
    const { result } = parseInboundConfig(doc);
    expect(result.valid).toBe(false);
    expect(result.errors[0].field).toBe('inbounds[0].settings.clients[1].email');
    expect(result.errors[0].message).toBe('Duplicate client name "alice"');
  });

  it('should reject duplicate client ids', () => {
    const doc = realityDocument({
      settings: {
        clients: [
          { id: 'test-secret', email: 'alice' },
          { id: 'test-secret', email: 'bob' },
        ],
      },
      streamSettings: { network: 'tcp', security: 'none' },
    });
    const { result } = parseInboundConfig(doc);
    expect(result.errors).toEqual([
      { field: 'inbounds[0].settings.clients[1].id', message: 'Duplicate client id for "bob"', value: undefined },
    ]);
  });

  it('should reject a malformed short ID', () => {
    const doc = realityDocument({
      streamSettings: {
        network: 'tcp',
        security: 'reality',
        realitySettings: { privateKey: 'test-private-key', shortIds: ['abc'], serverNames: ['addons.mozilla.org'] },
      },
    });
    const { config, result } = parseInboundConfig(doc);
    expect(config).toBeNull();
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].field).toBe('inbounds[0].streamSettings.realitySettings.shortIds[0]');
  });

  it('should accept the empty short ID', () => {
    const doc = realityDocument({
      streamSettings: {
        network: 'tcp',
        security: 'reality',
        realitySettings: { privateKey: 'test-private-key', shortIds: [''], serverNames: ['addons.mozilla.org'] },
      },
    });
    expect(parseInboundConfig(doc).result.valid).toBe(true);
  });

  it('should reject an unknown security mode', () => {
    const doc = realityDocument({ streamSettings: { network: 'tcp', security: 'tls' } });
    const { result } = parseInboundConfig(doc);
    expect(result.errors[0]).toEqual({
      field: 'inbounds[0].streamSettings.security',
      message: 'Security must be "none" or "reality"',
      value: 'tls',
    });
  });

  it('should warn for a Reality client without the vision flow', () => {
    const doc = realityDocument({
      settings: { clients: [{ id: '11111111-2222-4333-8444-555555555555', email: 'alice' }] },
    });
    const { config, result } = parseInboundConfig(doc);
    expect(config).not.toBeNull();
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      {
        field: 'inbounds[0].settings.clients[0].flow',
        message: 'Client "alice" has flow "" on a Reality inbound',
        suggestion: 'Set flow to "xtls-rprx-vision"',
      },
    ]);
  });
});

describe('formatValidationResult', () => {
  it('should format a clean result', () => {
    const { result } = parseInboundConfig(realityDocument());
    expect(formatValidationResult(result)).toBe('✓ Configuration is valid');
  });

  it('should format errors with their values', () => {
    const { result } = parseInboundConfig({ inbounds: [] });
    expect(formatValidationResult(result)).toBe(
      ['Errors:', '  ✗ inbounds: At least one inbound is required', '    Value: []'].join('\n')
    );
  });

  it('should format warnings with suggestions', () => {
    const output = formatValidationResult({
      valid: true,
      errors: [],
      warnings: [{ field: 'inbounds[0].port', message: 'Privileged port', suggestion: 'Use a port above 1024' }],
    });
    expect(output).toBe(
      [
        'Warnings:',
        '  ⚠ inbounds[0].port: Privileged port',
        '    Suggestion: Use a port above 1024',
        '',
        '✓ Configuration is valid (with warnings)',
      ].join('\n')
    );
  });
});

describe('assertValidName', () => {
  it('should accept letters, digits, dash and underscore', () => {
    expect(() => assertValidName('alice_01-phone')).not.toThrow();
  });

  it.each(['', 'bad name', 'a/b', 'ünï'])('should reject %j', (name) => {
    let caught: unknown;
    try {
      assertValidName(name);
    } catch (err) {
      caught = err;
    }
    expect(isEngineError(caught, 'InvalidInput')).toBe(true);
  });
});

describe('assertValidUuid', () => {
  it('should accept a lowercase UUID', () => {
    expect(() => assertValidUuid('11111111-2222-4333-8444-555555555555')).not.toThrow();
  });

  it('should reject anything else', () => {
    expect(() => assertValidUuid('test-secret')).toThrow('Invalid UUID "test-secret"');
  });
});
