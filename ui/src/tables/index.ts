/**
 * Tables Module
 *
 * Sortable HTML tables: columns, sort links derived from the request's query
 * string, and per-column cell renderers.
 *
 * @module tables
 */

export {Column, flipDirection, parseSortDirection} from './column';
export {Table} from './table';
export type {ColumnInput, TableOptions} from './table';

export type {
  CellRenderer,
  ColumnOptions,
  ColumnSpec,
  ColumnSpecKind,
  Row,
} from './column_spec';

export {defineSortableModel, isSortableField} from './sortable_model';
export type {SortableModel} from './sortable_model';

export {sortRows, resolveSortState} from './sort_rows';
export type {SortRowsOptions, SortState} from './sort_rows';

export {formatCellValue, labelFromField} from './formatters';
export {CLASS_NAMES, renderTableView} from './table_view';
export type {TableViewAttrs} from './table_view';
export {renderToHtml} from './render_html';
