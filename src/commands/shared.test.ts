// Path: src/commands/shared.test.ts
// Unit tests for CLI argument parsing and error output

import { describe, it, expect, vi, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parsePort, parseProtocol, printEngineError } from './shared.js';
import { EngineError } from '../utils/error.js';

vi.mock('../lib/logger.js', () => ({
  logger: {
    child: vi.fn(() => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    })),
  },
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
  configLogger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('parseProtocol', () => {
  it('should accept every known protocol', () => {
    expect(parseProtocol('vless')).toBe('vless');
    expect(parseProtocol('shadowsocks')).toBe('shadowsocks');
    expect(parseProtocol('wireguard')).toBe('wireguard');
    expect(parseProtocol('proxy')).toBe('proxy');
  });

  it('should reject unknown protocols', () => {
    expect(() => parseProtocol('openvpn')).toThrow(InvalidArgumentError);
    expect(() => parseProtocol('openvpn')).toThrow('Must be one of: vless, shadowsocks, wireguard, proxy');
  });
});

describe('parsePort', () => {
  it('should parse integer ports', () => {
    expect(parsePort('8443')).toBe(8443);
  });

  it.each(['0', '65536', '44.5', 'https'])('should reject %j', (value) => {
    expect(() => parsePort(value)).toThrow(InvalidArgumentError);
  });
});

describe('printEngineError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print validation errors carried in metadata', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    printEngineError(
      new EngineError('Config document failed validation: /tmp/config.json', 'ConfigCorrupt', {
        metadata: { errors: [{ field: 'inbounds', message: 'At least one inbound is required' }] },
      })
    );

    expect(spy).toHaveBeenCalledTimes(2);
    expect(spy.mock.calls[1]).toEqual(['Errors:\n  ✗ inbounds: At least one inbound is required']);
  });

  it('should print only the message without validation metadata', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    printEngineError(new EngineError('vless is not installed', 'NotFound'));
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
