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
import {ColumnConfigurationError, InvalidRendererError} from '../core/table_errors';
import {resetTableSettings, updateTableSettings} from '../core/table_settings';
import {Column, flipDirection, parseSortDirection} from './column';
import {defineSortableModel} from './sortable_model';

interface Game {
  id: number;
  name: string;
}

beforeEach(() => {
  resetTableSettings();
});

// =============================================================================
// Construction
// =============================================================================

describe('Column.create', () => {
  it('derives the label from a lone field', () => {
    const column = Column.create({kind: 'field', field: 'created_at'});

    expect(column.getField()).toBe('created_at');
    expect(column.getLabel()).toBe('Created At');
    expect(column.isSortable()).toBe(false);
    expect(column.hasRenderer()).toBe(false);
  });

  it('applies an options mapping', () => {
    const column = Column.fromOptions({field: 'id', label: 'ID', sortable: true, direction: 'desc'});

    expect(column.getField()).toBe('id');
    expect(column.getLabel()).toBe('ID');
    expect(column.isSortable()).toBe(true);
    expect(column.getDirection(requestContextFromUrl('/games'))).toBe('desc');
  });

  it('uses a given field and label', () => {
    const column = Column.fromFieldLabel('name', 'Title');

    expect(column.getField()).toBe('name');
    expect(column.getLabel()).toBe('Title');
  });

  it('derives the label when field options carry none', () => {
    const column = Column.fromFieldOptions('release_date', {sortable: true});

    expect(column.getLabel()).toBe('Release Date');
    expect(column.isSortable()).toBe(true);
  });

  it('keeps a label given in field options', () => {
    const column = Column.fromFieldOptions('release_date', {label: 'Released'});

    expect(column.getLabel()).toBe('Released');
  });

  it('wires a renderer given with field and label', () => {
    const column = Column.fromFieldLabelRenderer<Game>(
      'name',
      'Custom Column Name',
      (game) => 'The name of the game is ' + game.name,
    );

    expect(column.getLabel()).toBe('Custom Column Name');
    expect(column.hasRenderer()).toBe(true);
    expect(column.render({id: 1, name: 'Terraria'})).toBe('The name of the game is Terraria');
  });

  it('rejects an empty field', () => {
    expect(() => Column.fromField('')).toThrow(ColumnConfigurationError);
    expect(() => new Column('')).toThrow(ColumnConfigurationError);
  });

  it('rejects options without a field', () => {
    expect(() => Column.create({kind: 'options', options: JSON.parse('{"label":"Name"}')}))
      .toThrow(ColumnConfigurationError);
  });

  it('rejects unknown option keys', () => {
    const options = {field: 'id', colour: 'red'};

    expect(() => Column.create({kind: 'options', options})).toThrow(
      'Invalid column spec: options: Unrecognized key(s) in object: \'colour\'',
    );
  });

  it('rejects an unknown direction', () => {
    expect(() => Column.create({kind: 'options', options: JSON.parse('{"field":"id","direction":"up"}')}))
      .toThrow(ColumnConfigurationError);
  });

  it('rejects an unrecognised spec kind', () => {
    expect(() => Column.create(JSON.parse('{"kind":"columns","field":"id"}')))
      .toThrow(ColumnConfigurationError);
  });

  it('raises InvalidRendererError for a renderer that is not a function', () => {
    const spec = JSON.parse('{"kind":"field-label-renderer","field":"name","label":"Name","renderer":"bold"}');

    expect(() => Column.create(spec)).toThrow(InvalidRendererError);
  });
});

// =============================================================================
// Renderers
// =============================================================================

describe('Column renderers', () => {
  it('refuses a value that is not callable', () => {
    const column = Column.fromField<Game>('name');

    expect(() => column.setRenderer('not a function')).toThrow(InvalidRendererError);
    expect(() => column.setRenderer(null)).toThrow('Callable function not provided');
    expect(column.hasRenderer()).toBe(false);
  });

  it('renders through a configured function', () => {
    const column = Column.fromField<Game>('id');
    column.setRenderer((game) => `<strong>${game.id}</strong>`);

    expect(column.hasRenderer()).toBe(true);
    expect(column.render({id: 7, name: 'Celeste'})).toBe('<strong>7</strong>');
  });

  it('produces nothing without a renderer', () => {
    const column = Column.fromField<Game>('name');

    expect(column.render({id: 7, name: 'Celeste'})).toBeUndefined();
  });
});

// =============================================================================
// Sort state
// =============================================================================

describe('Column.isSorted', () => {
  it('matches the sort field parameter', () => {
    const ctx = requestContextFromUrl('/games?sort=name');

    expect(Column.fromField('name').isSorted(ctx)).toBe(true);
    expect(Column.fromField('id').isSorted(ctx)).toBe(false);
  });

  it('falls back to the model default only without a sort parameter', () => {
    const model = defineSortableModel(['name', 'id'], 'name');
    const name = Column.fromField('name');
    const id = Column.fromField('id');
    name.setOptionsFromModel(model);
    id.setOptionsFromModel(model);

    expect(name.isSorted(requestContextFromUrl('/games'))).toBe(true);
    expect(id.isSorted(requestContextFromUrl('/games'))).toBe(false);
    expect(name.isSorted(requestContextFromUrl('/games?sort=id'))).toBe(false);
    expect(id.isSorted(requestContextFromUrl('/games?sort=id'))).toBe(true);
  });

  it('treats an empty sort parameter as absent', () => {
    const column = Column.fromField('name');
    column.setOptionsFromModel(defineSortableModel(['name'], 'name'));

    expect(column.isSorted(requestContextFromUrl('/games?sort='))).toBe(true);
  });

  it('marks columns the model lists as sortable', () => {
    const model = defineSortableModel(['name']);
    const name = Column.fromField('name');
    const id = Column.fromField('id');
    name.setOptionsFromModel(model);
    id.setOptionsFromModel(model);

    expect(name.isSortable()).toBe(true);
    expect(id.isSortable()).toBe(false);
    expect(name.getModel()).toBe(model);
  });

  it('reads the configured query keys', () => {
    updateTableSettings({sortFieldKey: 'order_by'});

    expect(Column.fromField('name').isSorted(requestContextFromUrl('/games?order_by=name'))).toBe(true);
    expect(Column.fromField('name').isSorted(requestContextFromUrl('/games?sort=name'))).toBe(false);
  });
});

describe('Column.getDirection', () => {
  it('takes the direction from the request when sorted', () => {
    const column = Column.fromField('name');

    expect(column.getDirection(requestContextFromUrl('/games?sort=name&direction=desc'))).toBe('desc');
  });

  it('accepts an upper-case direction', () => {
    const column = Column.fromField('name');

    expect(column.getDirection(requestContextFromUrl('/games?sort=name&direction=DESC'))).toBe('desc');
  });

  it('uses the default direction when the sorted request names none', () => {
    const column = Column.fromFieldOptions('name', {direction: 'desc'});

    expect(column.getDirection(requestContextFromUrl('/games?sort=name'))).toBe('asc');
  });

  it('ignores the request direction when another column is sorted', () => {
    const column = Column.fromFieldOptions('name', {direction: 'desc'});

    expect(column.getDirection(requestContextFromUrl('/games?sort=id&direction=asc'))).toBe('desc');
  });

  it('follows the configured default direction', () => {
    updateTableSettings({defaultDirection: 'desc'});

    expect(Column.fromField('name').getDirection(requestContextFromUrl('/games'))).toBe('desc');
  });

  it('keeps the configured direction across requests', () => {
    const column = Column.fromFieldOptions('name', {direction: 'desc'});

    expect(column.getDirection(requestContextFromUrl('/games?sort=name&direction=asc'))).toBe('asc');
    expect(column.getDirection(requestContextFromUrl('/games?sort=id'))).toBe('desc');
    expect(column.getDirection(requestContextFromUrl('/games?sort=name'))).toBe('asc');
    expect(column.getDirection(requestContextFromUrl('/games'))).toBe('desc');
  });
});

describe('Column.getSortURL', () => {
  it('links an unsorted column in its own direction', () => {
    const column = Column.fromField('name');

    expect(column.getSortURL(requestContextFromUrl('/games'))).toBe('/games?sort=name&direction=asc');
  });

  it('flips the direction of the sorted column', () => {
    const column = Column.fromField('name');

    expect(column.getSortURL(requestContextFromUrl('/games?sort=name&direction=asc')))
      .toBe('/games?sort=name&direction=desc');
  });

  it('alternates asc and desc when its links are followed', () => {
    const column = Column.fromField('name');
    let url = '/games?sort=name&direction=asc';
    const directions: string[] = [];

    for (let i = 0; i < 3; i++) {
      const ctx = requestContextFromUrl(url);
      url = column.getSortURL(ctx);
      directions.push(column.getDirection(requestContextFromUrl(url)));
    }

    expect(directions).toEqual(['desc', 'asc', 'desc']);
    expect(url).toBe('/games?sort=name&direction=desc');
  });

  it('flips from the default direction for the model default column', () => {
    const column = Column.fromField('name');
    column.setOptionsFromModel(defineSortableModel(['name'], 'name'));

    expect(column.getSortURL(requestContextFromUrl('/games'))).toBe('/games?sort=name&direction=desc');
  });

  it('honours an explicit direction', () => {
    const column = Column.fromField('name');

    expect(column.getSortURL(requestContextFromUrl('/games?sort=name&direction=desc'), 'desc'))
      .toBe('/games?sort=name&direction=desc');
  });

  it('keeps other query parameters and replaces the sort pair', () => {
    const column = Column.fromField('name');
    const ctx = requestContextFromUrl('/games?page=2&sort=id&direction=desc&q=Mario%20Kart');

    expect(column.getSortURL(ctx)).toBe('/games?page=2&q=Mario%20Kart&sort=name&direction=asc');
  });

  it('prefixes the base URL', () => {
    const column = Column.fromField('name');

    expect(column.getSortURL(requestContextFromUrl('/games', 'https://example.test/')))
      .toBe('https://example.test/games?sort=name&direction=asc');
  });

  it('writes the configured query keys', () => {
    updateTableSettings({sortFieldKey: 'order_by', sortDirectionKey: 'order'});
    const column = Column.fromField('name');

    expect(column.getSortURL(requestContextFromUrl('/games?order_by=name&order=asc')))
      .toBe('/games?order_by=name&order=desc');
  });

  it('builds the same link for a request after serving another one', () => {
    const column = Column.fromFieldOptions('name', {direction: 'desc'});
    const unsorted = requestContextFromUrl('/games');

    expect(column.getSortURL(unsorted)).toBe('/games?sort=name&direction=desc');
    column.getDirection(requestContextFromUrl('/games?sort=name'));
    expect(column.getSortURL(unsorted)).toBe('/games?sort=name&direction=desc');
  });
});

describe('direction helpers', () => {
  it('parses known directions only', () => {
    expect(parseSortDirection('asc')).toBe('asc');
    expect(parseSortDirection('Desc')).toBe('desc');
    expect(parseSortDirection('sideways')).toBeUndefined();
    expect(parseSortDirection(undefined)).toBeUndefined();
  });

  it('flips directions', () => {
    expect(flipDirection('asc')).toBe('desc');
    expect(flipDirection('desc')).toBe('asc');
  });
});
