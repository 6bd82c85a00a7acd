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

import m from 'mithril';
import {RequestContext} from '../core/request_context';
import {Column} from './column';
import {formatCellValue, readField} from './formatters';

// Class hooks for stylesheets of the host application
export const CLASS_NAMES = {
  table: 'sortable-table',
  sortable: 'sortable',
  sorted: 'sorted',
  sortLink: 'sort-link',
  indicator: 'sort-indicator',
  emptyRow: 'empty',
};

const INDICATORS = {
  asc: '▲',
  desc: '▼',
};

export interface TableViewAttrs<R extends object> {
  columns: readonly Column<R>[];
  rows: readonly R[];
  ctx: RequestContext;
  emptyMessage?: string;
}

export function renderHeaderCell<R extends object>(column: Column<R>, ctx: RequestContext): m.Vnode {
  const label = column.getLabel();
  if (!column.isSortable()) {
    return m('th', label);
  }

  const classes = [CLASS_NAMES.sortable];
  let indicator: m.Vnode | null = null;
  if (column.isSorted(ctx)) {
    const direction = column.getDirection(ctx);
    classes.push(CLASS_NAMES.sorted, direction);
    indicator = m('span', {class: CLASS_NAMES.indicator}, INDICATORS[direction]);
  }

  return m('th', {class: classes.join(' ')}, [
    m('a', {class: CLASS_NAMES.sortLink, href: column.getSortURL(ctx)}, label),
    indicator,
  ]);
}

/**
 * A column's renderer output is trusted markup; without a renderer the raw
 * field value is shown as text.
 */
export function renderBodyCell<R extends object>(column: Column<R>, row: R): m.Vnode {
  const rendered = column.render(row);
  if (rendered !== undefined) {
    return m('td', m.trust(rendered));
  }
  return m('td', formatCellValue(readField(row, column.getField())));
}

export function renderTableView<R extends object>(attrs: TableViewAttrs<R>): m.Vnode {
  const {columns, rows, ctx, emptyMessage} = attrs;

  const body = rows.length === 0 && emptyMessage !== undefined
    ? [m('tr', {class: CLASS_NAMES.emptyRow},
        m('td', {colspan: Math.max(columns.length, 1)}, emptyMessage))]
    : rows.map((row) => m('tr', columns.map((column) => renderBodyCell(column, row))));

  return m('table', {class: CLASS_NAMES.table}, [
    m('thead',
      m('tr', columns.map((column) => renderHeaderCell(column, ctx)))
    ),
    m('tbody', body),
  ]);
}
