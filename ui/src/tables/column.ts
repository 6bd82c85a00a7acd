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

import {
  ColumnConfigurationError,
  InvalidRendererError,
  describeIssues,
} from '../core/table_errors';
import {
  QueryParams,
  RequestContext,
  buildUrl,
  mergeQuery,
  readQueryValue,
} from '../core/request_context';
import {
  SortDirection,
  SortDirectionSchema,
  TableSettings,
  resolveTableSettings,
} from '../core/table_settings';
import {
  CellRenderer,
  ColumnOptions,
  ColumnOptionsSchema,
  ColumnSpec,
  ColumnSpecSchema,
  Row,
  isCellRenderer,
  isRendererIssue,
} from './column_spec';
import {labelFromField} from './formatters';
import {SortableModel, isSortableField} from './sortable_model';

export function parseSortDirection(value: string | undefined): SortDirection | undefined {
  if (value === undefined) {
    return undefined;
  }
  const result = SortDirectionSchema.safeParse(value.toLowerCase());
  return result.success ? result.data : undefined;
}

export function flipDirection(direction: SortDirection): SortDirection {
  return direction === 'asc' ? 'desc' : 'asc';
}

/**
 * One column of a rendered table: which row field it shows, how its header
 * reads, whether users may sort by it and how its cells are rendered.
 *
 * Sort state is never stored globally; every sort-related call takes the
 * RequestContext of the request being rendered.
 */
export class Column<R extends object = Row> {
  // The model this column belongs to; supplies the default sort field.
  private model?: SortableModel;
  private field: string;
  private label: string;
  // Configured direction; only setDirection and options write it.
  private direction?: SortDirection;
  private sortable = false;
  private renderer?: CellRenderer<R>;
  private settingsOverride?: Partial<TableSettings>;

  constructor(field: string, label?: string) {
    if (!field) {
      throw new ColumnConfigurationError('Invalid column spec: field: field must not be empty');
    }
    this.field = field;
    this.label = label ?? labelFromField(field);
  }

  static create<R extends object = Row>(spec: ColumnSpec<R>): Column<R> {
    const parsed = ColumnSpecSchema.safeParse(spec);
    if (!parsed.success) {
      if (isRendererIssue(parsed.error)) {
        throw new InvalidRendererError();
      }
      throw new ColumnConfigurationError(`Invalid column spec: ${describeIssues(parsed.error, 'spec')}`);
    }

    switch (spec.kind) {
      case 'field':
        return new Column<R>(spec.field);
      case 'options': {
        const column = new Column<R>(spec.options.field);
        column.setParameters(spec.options);
        return column;
      }
      case 'field-label':
        return new Column<R>(spec.field, spec.label);
      case 'field-options': {
        const column = new Column<R>(spec.field);
        column.setParameters(spec.options);
        if (spec.options.label === undefined) {
          column.setLabel(labelFromField(column.getField()));
        }
        return column;
      }
      case 'field-label-renderer': {
        const column = new Column<R>(spec.field, spec.label);
        column.setRenderer(spec.renderer);
        return column;
      }
    }
  }

  static fromField<R extends object = Row>(field: string): Column<R> {
    return Column.create<R>({kind: 'field', field});
  }

  static fromOptions<R extends object = Row>(options: ColumnOptions<R> & {field: string}): Column<R> {
    return Column.create<R>({kind: 'options', options});
  }

  static fromFieldLabel<R extends object = Row>(field: string, label: string): Column<R> {
    return Column.create<R>({kind: 'field-label', field, label});
  }

  static fromFieldOptions<R extends object = Row>(field: string, options: ColumnOptions<R>): Column<R> {
    return Column.create<R>({kind: 'field-options', field, options});
  }

  static fromFieldLabelRenderer<R extends object = Row>(
    field: string,
    label: string,
    renderer: CellRenderer<R>,
  ): Column<R> {
    return Column.create<R>({kind: 'field-label-renderer', field, label, renderer});
  }

  /**
   * Sets some common-sense options based on the underlying data model.
   */
  setOptionsFromModel(model: SortableModel): void {
    if (isSortableField(model, this.field)) {
      this.setSortable(true);
    }
    this.model = model;
  }

  getModel(): SortableModel | undefined {
    return this.model;
  }

  /**
   * Settings layered over the process-wide ones; set by the owning table.
   */
  setSettings(overrides: Partial<TableSettings> | undefined): void {
    this.settingsOverride = overrides;
  }

  getSettings(): TableSettings {
    return resolveTableSettings(this.settingsOverride);
  }

  /**
   * True if the request sorts by this column, or names no sort field and this
   * is the model's default sort field.
   */
  isSorted(ctx: RequestContext): boolean {
    const requested = readQueryValue(ctx.query, this.getSettings().sortFieldKey);
    if (requested === this.field) {
      return true;
    }
    return requested === undefined && this.model?.defaultSortField === this.field;
  }

  /**
   * The direction this column sorts in for `ctx`. A sorted column takes it
   * from the request, falling back to the settings' default; an unsorted one
   * uses its configured direction, then the default. Request state is never
   * stored on the column, so one column can serve many requests.
   */
  getDirection(ctx: RequestContext): SortDirection {
    const settings = this.getSettings();
    if (this.isSorted(ctx)) {
      const requested = parseSortDirection(readQueryValue(ctx.query, settings.sortDirectionKey));
      return requested ?? settings.defaultDirection;
    }
    return this.direction ?? settings.defaultDirection;
  }

  /**
   * URL that sorts the table by this column. Without an explicit direction,
   * an already sorted column links to the opposite of its current direction.
   */
  getSortURL(ctx: RequestContext, direction?: SortDirection): string {
    let target = direction;
    if (!target) {
      target = this.getDirection(ctx);
      if (this.isSorted(ctx)) {
        target = flipDirection(target);
      }
    }

    const {sortFieldKey, sortDirectionKey} = this.getSettings();
    return this.generateUrl(ctx, {
      [sortFieldKey]: this.field,
      [sortDirectionKey]: target,
    });
  }

  /**
   * URL of the current route with `params` replacing the matching keys of
   * the current query.
   */
  generateUrl(ctx: RequestContext, params: QueryParams = {}): string {
    return buildUrl(ctx, mergeQuery(ctx.query, params));
  }

  getField(): string {
    return this.field;
  }

  setField(field: string): void {
    if (!field) {
      throw new ColumnConfigurationError('Invalid column spec: field: field must not be empty');
    }
    this.field = field;
  }

  getLabel(): string {
    return this.label;
  }

  setLabel(label: string): void {
    this.label = label;
  }

  isSortable(): boolean {
    return this.sortable;
  }

  setSortable(sortable: boolean): void {
    this.sortable = sortable;
  }

  setDirection(direction: SortDirection | undefined): void {
    this.direction = direction;
  }

  /**
   * Apply an options mapping. Every key must be a known option.
   */
  setParameters(options: ColumnOptions<R>): void {
    const parsed = ColumnOptionsSchema.safeParse(options);
    if (!parsed.success) {
      if (isRendererIssue(parsed.error)) {
        throw new InvalidRendererError();
      }
      throw new ColumnConfigurationError(`Invalid column options: ${describeIssues(parsed.error, 'options')}`);
    }

    if (options.field !== undefined) this.setField(options.field);
    if (options.label !== undefined) this.setLabel(options.label);
    if (options.sortable !== undefined) this.setSortable(options.sortable);
    if (options.direction !== undefined) this.setDirection(options.direction);
    if (options.renderer !== undefined) this.setRenderer(options.renderer);
  }

  /**
   * Cell markup from the renderer, or undefined when there is none and the
   * caller should show the raw field.
   */
  render(row: R): string | undefined {
    if (this.renderer) {
      return this.renderer(row);
    }
    return undefined;
  }

  hasRenderer(): boolean {
    return this.renderer !== undefined;
  }

  setRenderer(renderer: CellRenderer<R>): void;
  setRenderer(renderer: unknown): void;
  setRenderer(renderer: unknown): void {
    if (!isCellRenderer<R>(renderer)) {
      throw new InvalidRendererError();
    }
    this.renderer = renderer;
  }
}
