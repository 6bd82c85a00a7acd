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

import {describe, it, expect, beforeEach} from '@jest/globals';

import {requestContextFromUrl} from '../core/request_context';
import {TableSettingsError} from '../core/table_errors';
import {resetTableSettings} from '../core/table_settings';
import {Column} from './column';
import {defineSortableModel} from './sortable_model';
import {Table} from './table';

interface Game {
  id: number;
  name: string;
}

const GAMES: Game[] = [
  {id: 2, name: 'Celeste'},
  {id: 1, name: 'Terraria'},
];

beforeEach(() => {
  resetTableSettings();
});

describe('Table creation', () => {
  it('can add a column', () => {
    const table = Table.create<Game>([{id: 1, name: 'Terraria'}], false);

    table.addColumn({kind: 'field', field: 'id'});

    expect(table.getColumns()).toHaveLength(1);
  });

  it('can add a column renderer', () => {
    const table = Table.create<Game>([{id: 1, name: 'Terraria'}], false);

    table.addColumn({kind: 'options', options: {field: 'id'}});
    table.addColumn({
      kind: 'field-label-renderer',
      field: 'name',
      label: 'Custom Column Name',
      renderer: (game) => 'The name of the game is ' + game.name,
    });

    const rendered = table.render();

    expect(rendered).toContain('<th>Custom Column Name</th>');
    expect(rendered).toContain('<td>The name of the game is Terraria</td>');
    expect(rendered).toContain('<td>1</td>');
  });

  it('derives columns from the first row', () => {
    const table = Table.create(GAMES);

    expect(table.getColumns().map((column) => column.getField())).toEqual(['id', 'name']);
    expect(table.getColumns().map((column) => column.getLabel())).toEqual(['Id', 'Name']);
  });

  it('has no derived columns without rows', () => {
    expect(Table.create<Game>([]).getColumns()).toEqual([]);
  });

  it('accepts specs and prebuilt columns together', () => {
    const prebuilt = Column.fromFieldLabel<Game>('name', 'Title');
    const table = Table.create<Game>(GAMES, [{kind: 'field', field: 'id'}, prebuilt]);

    expect(table.getColumns()).toHaveLength(2);
    expect(table.getColumns()[1]).toBe(prebuilt);
  });

  it('returns a copy of its columns', () => {
    const table = Table.create<Game>(GAMES, false);
    table.getColumns().push(Column.fromField<Game>('id'));

    expect(table.getColumns()).toHaveLength(0);
  });

  it('rejects conflicting settings overrides', () => {
    expect(() => Table.create<Game>(GAMES, false, {settings: {sortFieldKey: 'direction'}}))
      .toThrow(TableSettingsError);
  });
});

describe('Table rendering', () => {
  it('escapes raw field values', () => {
    const table = Table.create([{name: '<b>Terraria</b> & friends'}]);

    expect(table.render()).toContain('<td>&lt;b&gt;Terraria&lt;/b&gt; &amp; friends</td>');
  });

  it('inserts renderer output as markup', () => {
    const table = Table.create<Game>(GAMES, false);
    table.addColumn({
      kind: 'field-label-renderer',
      field: 'id',
      label: 'ID',
      renderer: (game) => `<strong>${game.id}</strong>`,
    });

    expect(table.render()).toContain('<td><strong>2</strong></td>');
  });

  it('renders absent values as empty cells', () => {
    const table = Table.create([{name: null}], [{kind: 'field', field: 'name'}]);

    expect(table.render()).toContain('<td></td>');
  });

  it('renders plain headers for columns that cannot be sorted', () => {
    const table = Table.create<Game>(GAMES, [{kind: 'field', field: 'id'}]);

    expect(table.render(requestContextFromUrl('/games'))).toContain('<th>Id</th>');
  });

  it('links sortable headers and marks the sorted one', () => {
    const table = Table.create<Game>(
      GAMES,
      [{kind: 'field', field: 'id'}, {kind: 'field', field: 'name'}],
      {model: defineSortableModel(['id', 'name'], 'name')},
    );

    const rendered = table.render(requestContextFromUrl('/games'));

    expect(rendered).toContain('class="sortable sorted asc"');
    expect(rendered).toContain('href="/games?sort=name&amp;direction=desc"');
    expect(rendered).toContain('href="/games?sort=id&amp;direction=asc"');
    expect(rendered).toContain('▲');
    expect(rendered).not.toContain('▼');
  });

  it('renders rows in the requested order', () => {
    const table = Table.create<Game>(
      GAMES,
      [{kind: 'field', field: 'name'}],
      {model: defineSortableModel(['id', 'name'])},
    );
    const ctx = requestContextFromUrl('/games?sort=id&direction=asc');

    expect(table.getSortedRows(ctx).map((game) => game.id)).toEqual([1, 2]);
    const rendered = table.render(ctx);
    expect(rendered.indexOf('Terraria')).toBeLessThan(rendered.indexOf('Celeste'));
  });

  it('shows the empty message when there are no rows', () => {
    const table = Table.create<Game>([], [{kind: 'field', field: 'name'}], {emptyMessage: 'No games'});

    expect(table.render()).toContain('<td colspan="1">No games</td>');
  });

  it('passes settings overrides to its columns', () => {
    const table = Table.create<Game>(
      GAMES,
      [{kind: 'field', field: 'name'}],
      {model: defineSortableModel(['name']), settings: {sortFieldKey: 'order_by'}},
    );
    const [name] = table.getColumns();

    expect(table.getSettings().sortFieldKey).toBe('order_by');
    expect(name.getSortURL(requestContextFromUrl('/games'))).toBe('/games?order_by=name&direction=asc');
  });

  it('keeps the settings of a prebuilt column when the table has none', () => {
    const prebuilt = Column.fromField<Game>('name');
    prebuilt.setSettings({sortFieldKey: 'order_by'});

    Table.create<Game>(GAMES, [prebuilt]);

    expect(prebuilt.getSortURL(requestContextFromUrl('/games'))).toBe('/games?order_by=name&direction=asc');
  });

  it('renders the same markup for a request after serving another one', () => {
    const table = Table.create<Game>(
      GAMES,
      [{kind: 'field-options', field: 'name', options: {direction: 'desc'}}],
      {model: defineSortableModel(['name'])},
    );
    const unsorted = requestContextFromUrl('/games');

    const before = table.render(unsorted);
    table.render(requestContextFromUrl('/games?sort=name&direction=asc'));

    expect(table.render(unsorted)).toBe(before);
    expect(before).toContain('href="/games?sort=name&amp;direction=desc"');
  });
});
