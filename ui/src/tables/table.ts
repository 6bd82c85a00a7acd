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
import {RequestContext, requestContextFromUrl} from '../core/request_context';
import {TableSettings, resolveTableSettings} from '../core/table_settings';
import {Column} from './column';
import {ColumnSpec, Row} from './column_spec';
import {renderToHtml} from './render_html';
import {SortableModel} from './sortable_model';
import {sortRows} from './sort_rows';
import {renderTableView} from './table_view';

export type ColumnInput<R extends object = Row> = ColumnSpec<R> | Column<R>;

export interface TableOptions {
  model?: SortableModel;
  // Layered over the process-wide settings for this table only.
  settings?: Partial<TableSettings>;
  // Shown in a single row when there are no rows.
  emptyMessage?: string;
}

/**
 * A row collection plus the columns that present it.
 *
 * Pass `columns` as undefined to get one column per field of the first row,
 * `false` to start without columns, or a list of specs or columns.
 */
export class Table<R extends object = Row> {
  private readonly columns: Column<R>[] = [];
  private readonly rows: readonly R[];
  private readonly options: TableOptions;

  private constructor(rows: readonly R[], options: TableOptions) {
    // Fail on bad overrides now rather than on first render.
    resolveTableSettings(options.settings);
    this.rows = rows;
    this.options = options;
  }

  static create<R extends object = Row>(
    rows: readonly R[],
    columns?: readonly ColumnInput<R>[] | false,
    options: TableOptions = {},
  ): Table<R> {
    const table = new Table<R>(rows, options);
    if (columns === undefined) {
      table.addColumns(fieldsOf(rows).map((field): ColumnInput<R> => ({kind: 'field', field})));
    } else if (columns !== false) {
      table.addColumns(columns);
    }
    return table;
  }

  addColumn(input: ColumnInput<R>): Column<R> {
    const column = input instanceof Column ? input : Column.create<R>(input);
    if (this.options.settings) {
      column.setSettings(this.options.settings);
    }
    if (this.options.model) {
      column.setOptionsFromModel(this.options.model);
    }
    this.columns.push(column);
    return column;
  }

  addColumns(inputs: readonly ColumnInput<R>[]): Column<R>[] {
    return inputs.map((input) => this.addColumn(input));
  }

  getColumns(): Column<R>[] {
    return [...this.columns];
  }

  getRows(): readonly R[] {
    return this.rows;
  }

  getModel(): SortableModel | undefined {
    return this.options.model;
  }

  getSettings(): TableSettings {
    return resolveTableSettings(this.options.settings);
  }

  getSortedRows(ctx: RequestContext): R[] {
    return sortRows(this.rows, ctx, {model: this.options.model, settings: this.getSettings()});
  }

  view(ctx: RequestContext): m.Vnode {
    return renderTableView({
      columns: this.columns,
      rows: this.getSortedRows(ctx),
      ctx,
      emptyMessage: this.options.emptyMessage,
    });
  }

  render(ctx: RequestContext = requestContextFromUrl('/')): string {
    return renderToHtml(this.view(ctx));
  }
}

function fieldsOf(rows: readonly object[]): string[] {
  const first = rows[0];
  return first === undefined ? [] : Object.keys(first);
}
