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

/**
 * Process-wide table settings.
 *
 * Holds the names of the two query parameters that carry the sort state and
 * the direction used when a request does not name one. Settings can be
 * persisted to any Storage-like key/value store.
 */

import {z} from 'zod';
import {TableSettingsError, describeIssues} from './table_errors';

export const SortDirectionSchema = z.enum(['asc', 'desc']);
export type SortDirection = z.infer<typeof SortDirectionSchema>;

const TableSettingsObject = z.object({
  sortFieldKey: z.string().min(1),
  sortDirectionKey: z.string().min(1),
  defaultDirection: SortDirectionSchema,
}).strict();

export type TableSettings = z.infer<typeof TableSettingsObject>;

export const TableSettingsSchema = TableSettingsObject.refine(
  (settings) => settings.sortFieldKey !== settings.sortDirectionKey,
  {message: 'sortFieldKey and sortDirectionKey must be different query keys'},
);

// Stored settings may come from an older release; unknown keys are dropped.
const StoredSettingsSchema = TableSettingsObject.partial().strip();

export const SETTINGS_KEY = 'sortable-tables-settings';

export const DEFAULT_TABLE_SETTINGS: Readonly<TableSettings> = {
  sortFieldKey: 'sort',
  sortDirectionKey: 'direction',
  defaultDirection: 'asc',
};

/** The subset of the Web Storage API the settings need. */
export interface SettingsStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

type Listener = (settings: TableSettings) => void;

let current: TableSettings = {...DEFAULT_TABLE_SETTINGS};

const listeners = new Set<Listener>();

function notify(): void {
  const snapshot = getTableSettings();
  for (const listener of listeners) {
    try {
      listener(snapshot);
    } catch (error) {
      console.warn('[TableSettings] listener failed:', error);
    }
  }
}

export function parseTableSettings(input: unknown): TableSettings {
  const result = TableSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new TableSettingsError(`Invalid table settings: ${describeIssues(result.error, 'settings')}`);
  }
  return result.data;
}

export function getTableSettings(): TableSettings {
  return {...current};
}

/**
 * Returns the current settings with `overrides` applied on top. Throws
 * TableSettingsError if the combination is invalid.
 */
export function resolveTableSettings(overrides?: Partial<TableSettings>): TableSettings {
  if (!overrides) {
    return getTableSettings();
  }
  return parseTableSettings({...current, ...withoutUndefined(overrides)});
}

export function updateTableSettings(patch: Partial<TableSettings>): TableSettings {
  current = resolveTableSettings(patch);
  notify();
  return getTableSettings();
}

export function resetTableSettings(): void {
  current = {...DEFAULT_TABLE_SETTINGS};
  notify();
}

export function subscribeTableSettings(listener: Listener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

/**
 * Load settings from storage, merging stored values over the defaults.
 * Malformed data is reported and the defaults are used instead.
 */
export function loadTableSettings(storage: SettingsStorage): TableSettings {
  let loaded: TableSettings = {...DEFAULT_TABLE_SETTINGS};
  try {
    const stored = storage.getItem(SETTINGS_KEY);
    if (stored) {
      const parsed = StoredSettingsSchema.safeParse(JSON.parse(stored));
      if (parsed.success) {
        loaded = parseTableSettings({...DEFAULT_TABLE_SETTINGS, ...withoutUndefined(parsed.data)});
      } else {
        console.warn('[TableSettings] Ignoring stored settings:', describeIssues(parsed.error, 'settings'));
      }
    }
  } catch (error) {
    console.warn('[TableSettings] Failed to load settings:', error);
  }
  current = loaded;
  notify();
  return getTableSettings();
}

export function saveTableSettings(storage: SettingsStorage): void {
  try {
    storage.setItem(SETTINGS_KEY, JSON.stringify(current));
  } catch (error) {
    console.error('[TableSettings] Failed to save settings:', error);
  }
}

function withoutUndefined(patch: Partial<TableSettings>): Partial<TableSettings> {
  const result: Partial<TableSettings> = {};
  if (patch.sortFieldKey !== undefined) result.sortFieldKey = patch.sortFieldKey;
  if (patch.sortDirectionKey !== undefined) result.sortDirectionKey = patch.sortDirectionKey;
  if (patch.defaultDirection !== undefined) result.defaultDirection = patch.defaultDirection;
  return result;
}
