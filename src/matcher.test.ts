/**
 * Tests for match path expansion
 */

import { describe, it, expect } from 'vitest';
import { expandPath, getPath, joinPath, splitPath } from './matcher.js';
import type { JsonValue } from './types.js';

describe('splitPath', () => {
  it('should split on dots', () => {
    expect(splitPath('server.port')).toEqual(['server', 'port']);
  });

  it('should unescape ~1 and ~0 inside segments', () => {
    expect(splitPath('hosts.example~1com.tag~0v1')).toEqual([
      'hosts',
      'example.com',
      'tag~v1',
    ]);
  });

  it('should be reversed by joinPath', () => {
    expect(joinPath(['hosts', 'example.com', 'tag~v1'])).toBe(
      'hosts.example~1com.tag~0v1'
    );
  });
});

describe('getPath', () => {
  const document: JsonValue = {
    servers: [{ name: 'lobby' }, { name: 'survival' }],
    motd: null,
  };

  it('should index arrays with numeric segments', () => {
    expect(getPath(document, ['servers', '1', 'name'])).toBe('survival');
  });

  it('should return null nodes as null', () => {
    expect(getPath(document, ['motd'])).toBeNull();
  });

  it('should return undefined for missing keys', () => {
    expect(getPath(document, ['servers', 'name'])).toBeUndefined();
    expect(getPath(document, ['players'])).toBeUndefined();
  });

  it('should not read inherited properties', () => {
    expect(getPath(document, ['toString'])).toBeUndefined();
  });
});

describe('expandPath', () => {
  describe('without a wildcard', () => {
    it('should return the path itself', () => {
      expect(expandPath('server.port', {})).toEqual([['server', 'port']]);
    });

    it('should not depend on the document contents', () => {
      expect(expandPath('a.b.c', null)).toEqual([['a', 'b', 'c']]);
    });

    it('should treat a bare asterisk segment without a leading dot literally', () => {
      expect(expandPath('*.bind', {})).toEqual([['*', 'bind']]);
    });
  });

  describe('with a wildcard', () => {
    const document: JsonValue = {
      worlds: {
        world1: { bind: '0.0.0.0' },
        world2: { bind: '0.0.0.0' },
      },
      listeners: [{ host: '0.0.0.0' }, { host: '0.0.0.0' }, { host: '0.0.0.0' }],
    };

    it('should produce one path per object child in key order', () => {
      expect(expandPath('worlds.*.bind', document)).toEqual([
        ['worlds', 'world1', 'bind'],
        ['worlds', 'world2', 'bind'],
      ]);
    });

    it('should produce one path per array element', () => {
      expect(expandPath('listeners.*.host', document)).toEqual([
        ['listeners', '0', 'host'],
        ['listeners', '1', 'host'],
        ['listeners', '2', 'host'],
      ]);
    });

    it('should target an empty key inside each child when nothing follows the wildcard', () => {
      expect(expandPath('worlds.*', document)).toEqual([
        ['worlds', 'world1', ''],
        ['worlds', 'world2', ''],
      ]);
    });

    it('should look up an empty root key for an empty prefix', () => {
      expect(expandPath('.*.bind', { a: {}, b: {} })).toEqual([]);
      expect(expandPath('.*.bind', { '': { a: {} }, b: {} })).toEqual([
        ['', 'a', 'bind'],
      ]);
    });

    it('should return no paths for a missing prefix', () => {
      expect(expandPath('servers.*.bind', document)).toEqual([]);
    });

    it('should return no paths for a null prefix', () => {
      expect(expandPath('worlds.*.bind', { worlds: null })).toEqual([]);
    });

    it('should return no paths for a scalar prefix', () => {
      expect(expandPath('worlds.*.bind', { worlds: 'none' })).toEqual([]);
    });

    it('should skip null children', () => {
      expect(
        expandPath('worlds.*.bind', { worlds: { a: null, b: {} } })
      ).toEqual([['worlds', 'b', 'bind']]);
    });

    it('should only split on the first wildcard', () => {
      const nested: JsonValue = {
        worlds: { world1: { plugins: { essentials: { enabled: true } } } },
      };

      expect(expandPath('worlds.*.plugins.*.enabled', nested)).toEqual([
        ['worlds', 'world1', 'plugins', '*', 'enabled'],
      ]);
    });
  });
});
