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

import {RequestContext, readQueryValue} from '../core/request_context';
import {SortDirection, TableSettings, getTableSettings} from '../core/table_settings';
import {parseSortDirection} from './column';
import {readField} from './formatters';
import {SortableModel, isSortableField} from './sortable_model';

// Fields already reported as not sortable; each is logged once.
const reportedFields = new Set<string>();

export interface SortRowsOptions {
  model?: SortableModel;
  settings?: TableSettings;
}

export interface SortState {
  field: string;
  direction: SortDirection;
}

/**
 * The sort the request asks for, limited to fields the model allows.
 * Returns null when the rows should keep their order.
 */
export function resolveSortState(ctx: RequestContext, options: SortRowsOptions = {}): SortState | null {
  const settings = options.settings ?? getTableSettings();
  const field = readQueryValue(ctx.query, settings.sortFieldKey) ?? options.model?.defaultSortField;
  if (!field) {
    return null;
  }
  if (!isSortableField(options.model, field)) {
    if (!reportedFields.has(field)) {
      reportedFields.add(field);
      console.warn(`[SortRows] Ignoring sort on non-sortable field "${field}"`);
    }
    return null;
  }
  const direction = parseSortDirection(readQueryValue(ctx.query, settings.sortDirectionKey));
  return {field, direction: direction ?? settings.defaultDirection};
}

/**
 * Order rows by the request's sort state. Always returns a new array; the
 * input is left untouched. Null and undefined values sort last in either
 * direction.
 */
export function sortRows<R extends object>(
  rows: readonly R[],
  ctx: RequestContext,
  options: SortRowsOptions = {},
): R[] {
  const state = resolveSortState(ctx, options);
  if (!state) {
    return [...rows];
  }
  const {field, direction} = state;
  const sign = direction === 'asc' ? 1 : -1;

  return [...rows].sort((a, b) => {
    const va = readField(a, field);
    const vb = readField(b, field);
    const aMissing = va === null || va === undefined;
    const bMissing = vb === null || vb === undefined;
    if (aMissing || bMissing) {
      return Number(aMissing) - Number(bMissing);
    }
    return sign * compareValues(va, vb);
  });
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  return String(a).localeCompare(String(b));
}
