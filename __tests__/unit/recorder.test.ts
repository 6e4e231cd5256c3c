import { afterEach, describe, expect, it } from '@jest/globals';
import debug from 'debug';

import { debugRecorder, formatFields, noopRecorder } from '../../src/lib/utils/recorder.js';
import { buildUserAgent, getPackageInfo } from '../../src/lib/utils/user-agent.js';

describe('formatFields', () => {
  it('renders strings verbatim and other values as JSON', () => {
    expect(
      formatFields({
        url: 'https://ca/acme/new-order',
        count: 2,
        domains: ['a.example', 'b.example'],
        skipped: undefined,
      }),
    ).toBe('url=https://ca/acme/new-order count=2 domains=["a.example","b.example"]');
  });

  it('renders nothing for empty fields', () => {
    expect(formatFields({})).toBe('');
  });
});

describe('debugRecorder', () => {
  const namespace = 'acme-conductor:recorder-test';

  afterEach(() => {
    debug.disable();
  });

  it('writes event and fields through the debug namespace when enabled', () => {
    const lines: string[] = [];
    debug.enable(namespace);
    const recorder = debugRecorder('recorder-test');

    const original = debug.log;
    debug.log = (...args: unknown[]) => void lines.push(args.map(String).join(' '));
    try {
      recorder.record('order.new', { domains: ['a.example'] });
    } finally {
      debug.log = original;
    }

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('order.new domains=["a.example"]');
  });

  it('stays silent when the namespace is disabled', () => {
    const lines: string[] = [];
    const original = debug.log;
    debug.log = (...args: unknown[]) => void lines.push(args.map(String).join(' '));
    try {
      debugRecorder('recorder-test').record('nonce.fetch', { url: 'https://ca/nonce' });
    } finally {
      debug.log = original;
    }

    expect(lines).toEqual([]);
  });

  it('noopRecorder accepts anything', () => {
    expect(() => noopRecorder.record('any.event', { value: 1 })).not.toThrow();
  });
});

describe('user agent', () => {
  it('names this package and the Node version', () => {
    const { name, version } = getPackageInfo();

    expect(name).toBe('acme-conductor');
    expect(buildUserAgent()).toBe(`acme-conductor/${version} (Node/${process.version.slice(1)})`);
  });
});
