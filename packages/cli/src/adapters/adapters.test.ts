import { join } from 'node:path';
import { homedir } from 'node:os';
import { describe, it, expect, vi } from 'vitest';
import { createCallbackEventBridge } from './callback-event-bridge.js';
import { getConfigDir, getDataDir } from './xdg-paths.js';

describe('createCallbackEventBridge', () => {
  it('should forward events to the handlers that are set', () => {
    const onTitle = vi.fn();
    const onMemberComplete = vi.fn();
    const events = createCallbackEventBridge({ onTitle, onMemberComplete });

    events.onTitle('Ocean Tides');
    events.onMemberComplete(1, 'test/alpha', null);

    expect(onTitle).toHaveBeenCalledWith('Ocean Tides');
    expect(onMemberComplete).toHaveBeenCalledWith(1, 'test/alpha', null);
  });

  it('should ignore events without a handler', () => {
    const events = createCallbackEventBridge({});
    expect(() => events.onError('boom')).not.toThrow();
  });
});

describe('xdg paths', () => {
  it('should honour the XDG base directories', () => {
    expect(getConfigDir({ XDG_CONFIG_HOME: '/tmp/cfg' })).toBe(join('/tmp/cfg', 'synod'));
    expect(getDataDir({ XDG_DATA_HOME: '/tmp/data' })).toBe(join('/tmp/data', 'synod'));
  });

  it('should fall back to the home directory', () => {
    expect(getConfigDir({})).toBe(join(homedir(), '.config', 'synod'));
    expect(getDataDir({})).toBe(join(homedir(), '.local', 'share', 'synod'));
  });
});
