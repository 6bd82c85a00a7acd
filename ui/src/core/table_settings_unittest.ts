// Copyright (C) 2024 The Android Open Source Project
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//      http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import {describe, it, expect, jest, beforeEach, afterEach} from '@jest/globals';

import {TableSettingsError} from './table_errors';
import {
  DEFAULT_TABLE_SETTINGS,
  SETTINGS_KEY,
  SettingsStorage,
  TableSettings,
  getTableSettings,
  loadTableSettings,
  resetTableSettings,
  resolveTableSettings,
  saveTableSettings,
  subscribeTableSettings,
  updateTableSettings,
} from './table_settings';

class MemoryStorage implements SettingsStorage {
  private readonly items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }
}

beforeEach(() => {
  resetTableSettings();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('table settings', () => {
  it('starts from the defaults', () => {
    expect(getTableSettings()).toEqual({
      sortFieldKey: 'sort',
      sortDirectionKey: 'direction',
      defaultDirection: 'asc',
    });
  });

  it('applies partial updates', () => {
    const updated = updateTableSettings({defaultDirection: 'desc'});

    expect(updated).toEqual({...DEFAULT_TABLE_SETTINGS, defaultDirection: 'desc'});
    expect(getTableSettings().defaultDirection).toBe('desc');
  });

  it('hands out copies', () => {
    const settings = getTableSettings();
    settings.sortFieldKey = 'changed';

    expect(getTableSettings().sortFieldKey).toBe('sort');
  });

  it('rejects identical query keys and keeps the previous settings', () => {
    expect(() => updateTableSettings({sortDirectionKey: 'sort'})).toThrow(TableSettingsError);
    expect(getTableSettings()).toEqual(DEFAULT_TABLE_SETTINGS);
  });

  it('rejects empty query keys', () => {
    expect(() => updateTableSettings({sortFieldKey: ''})).toThrow(
      'Invalid table settings: sortFieldKey: String must contain at least 1 character(s)',
    );
  });

  it('ignores undefined overrides', () => {
    expect(resolveTableSettings({sortFieldKey: undefined})).toEqual(DEFAULT_TABLE_SETTINGS);
  });
});

describe('settings subscriptions', () => {
  it('notifies listeners until they unsubscribe', () => {
    const seen: TableSettings[] = [];
    const unsubscribe = subscribeTableSettings((settings) => seen.push(settings));

    updateTableSettings({sortFieldKey: 'order_by'});
    unsubscribe();
    updateTableSettings({sortFieldKey: 'sort'});

    expect(seen).toEqual([{...DEFAULT_TABLE_SETTINGS, sortFieldKey: 'order_by'}]);
  });

  it('keeps notifying after a listener fails', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const failure = new Error('listener exploded');
    const calls: string[] = [];
    const first = subscribeTableSettings(() => {
      throw failure;
    });
    const second = subscribeTableSettings((settings) => calls.push(settings.defaultDirection));

    updateTableSettings({defaultDirection: 'desc'});
    first();
    second();

    expect(calls).toEqual(['desc']);
    expect(warn).toHaveBeenCalledWith('[TableSettings] listener failed:', failure);
  });
});

describe('settings storage', () => {
  it('merges stored values over the defaults', () => {
    const storage = new MemoryStorage();
    storage.setItem(SETTINGS_KEY, JSON.stringify({sortFieldKey: 'order_by', legacyOption: true}));

    expect(loadTableSettings(storage)).toEqual({...DEFAULT_TABLE_SETTINGS, sortFieldKey: 'order_by'});
    expect(getTableSettings().sortFieldKey).toBe('order_by');
  });

  it('uses the defaults when nothing is stored', () => {
    updateTableSettings({defaultDirection: 'desc'});

    expect(loadTableSettings(new MemoryStorage())).toEqual(DEFAULT_TABLE_SETTINGS);
  });

  it('falls back to the defaults on malformed JSON', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const storage = new MemoryStorage();
    storage.setItem(SETTINGS_KEY, '{not json');

    expect(loadTableSettings(storage)).toEqual(DEFAULT_TABLE_SETTINGS);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('falls back to the defaults on invalid values', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const storage = new MemoryStorage();
    storage.setItem(SETTINGS_KEY, JSON.stringify({defaultDirection: 'sideways'}));

    expect(loadTableSettings(storage)).toEqual(DEFAULT_TABLE_SETTINGS);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('saves the current settings', () => {
    const storage = new MemoryStorage();
    updateTableSettings({sortDirectionKey: 'order'});

    saveTableSettings(storage);

    const stored = storage.getItem(SETTINGS_KEY);
    expect(stored).not.toBeNull();
    expect(JSON.parse(stored ?? '{}')).toEqual({...DEFAULT_TABLE_SETTINGS, sortDirectionKey: 'order'});
  });

  it('reports storage failures when saving', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('quota exceeded');
    const storage: SettingsStorage = {
      getItem: () => null,
      setItem: () => {
        throw failure;
      },
    };

    saveTableSettings(storage);

    expect(error).toHaveBeenCalledWith('[TableSettings] Failed to save settings:', failure);
  });
});
