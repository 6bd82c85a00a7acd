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

import {describe, it, expect, jest, afterEach} from '@jest/globals';

import {requestContextFromUrl} from '../core/request_context';
import {DEFAULT_TABLE_SETTINGS} from '../core/table_settings';
import {defineSortableModel} from './sortable_model';
import {resolveSortState, sortRows} from './sort_rows';

interface Release {
  title: string | null;
  sales: number;
}

const RELEASES: Release[] = [
  {title: 'Celeste', sales: 10},
  {title: null, sales: 9},
  {title: 'Apex', sales: 100},
];

const model = defineSortableModel(['title', 'sales']);

afterEach(() => {
  jest.restoreAllMocks();
});

describe('sortRows', () => {
  it('sorts strings ascending with missing values last', () => {
    const sorted = sortRows(RELEASES, requestContextFromUrl('/r?sort=title&direction=asc'), {model});

    expect(sorted.map((r) => r.title)).toEqual(['Apex', 'Celeste', null]);
  });

  it('keeps missing values last when descending', () => {
    const sorted = sortRows(RELEASES, requestContextFromUrl('/r?sort=title&direction=desc'), {model});

    expect(sorted.map((r) => r.title)).toEqual(['Celeste', 'Apex', null]);
  });

  it('compares numbers numerically', () => {
    const sorted = sortRows(RELEASES, requestContextFromUrl('/r?sort=sales'), {model});

    expect(sorted.map((r) => r.sales)).toEqual([9, 10, 100]);
  });

  it('uses the model default sort field without a sort parameter', () => {
    const withDefault = defineSortableModel(['sales'], 'sales');
    const sorted = sortRows(RELEASES, requestContextFromUrl('/r?direction=desc'), {model: withDefault});

    expect(sorted.map((r) => r.sales)).toEqual([100, 10, 9]);
  });

  it('keeps the order when nothing is requested', () => {
    const sorted = sortRows(RELEASES, requestContextFromUrl('/r'), {model});

    expect(sorted).toEqual(RELEASES);
    expect(sorted).not.toBe(RELEASES);
  });

  it('ignores fields the model does not allow', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});

    const sorted = sortRows(RELEASES, requestContextFromUrl('/r?sort=secret'), {model});

    expect(sorted.map((r) => r.sales)).toEqual([10, 9, 100]);
    expect(warn).toHaveBeenCalledWith('[SortRows] Ignoring sort on non-sortable field "secret"');
  });

  it('does not modify its input', () => {
    const rows = [...RELEASES];
    sortRows(rows, requestContextFromUrl('/r?sort=sales'), {model});

    expect(rows).toEqual(RELEASES);
  });

  it('reads custom query keys', () => {
    const settings = {...DEFAULT_TABLE_SETTINGS, sortFieldKey: 'by', sortDirectionKey: 'dir'};
    const sorted = sortRows(RELEASES, requestContextFromUrl('/r?by=sales&dir=desc'), {model, settings});

    expect(sorted.map((r) => r.sales)).toEqual([100, 10, 9]);
  });

  it('reports each non-sortable field once', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const ctx = requestContextFromUrl('/r?sort=publisher');

    sortRows(RELEASES, ctx, {model});
    sortRows(RELEASES, ctx, {model});
    sortRows(RELEASES, ctx);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[SortRows] Ignoring sort on non-sortable field "publisher"');
  });
});

describe('resolveSortState', () => {
  it('falls back to the default direction for unknown values', () => {
    expect(resolveSortState(requestContextFromUrl('/r?sort=title&direction=up'), {model}))
      .toEqual({field: 'title', direction: 'asc'});
  });

  it('returns null without a sort field', () => {
    expect(resolveSortState(requestContextFromUrl('/r'), {model})).toBeNull();
  });
});
