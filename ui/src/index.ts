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

export * from './tables';

export {
  ColumnConfigurationError,
  InvalidRendererError,
  TableError,
  TableSettingsError,
} from './core/table_errors';

export {
  buildUrl,
  mergeQuery,
  readQueryValue,
  requestContextFromUrl,
} from './core/request_context';
export type {QueryParams, RequestContext} from './core/request_context';

export {
  DEFAULT_TABLE_SETTINGS,
  SETTINGS_KEY,
  getTableSettings,
  loadTableSettings,
  parseTableSettings,
  resetTableSettings,
  saveTableSettings,
  subscribeTableSettings,
  updateTableSettings,
} from './core/table_settings';
export type {SettingsStorage, SortDirection, TableSettings} from './core/table_settings';
