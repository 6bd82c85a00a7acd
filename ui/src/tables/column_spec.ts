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

import {z} from 'zod';
import {SortDirection, SortDirectionSchema} from '../core/table_settings';

export type Row = Record<string, unknown>;

/** Maps a row to the markup of its cell. The result is inserted unescaped. */
export type CellRenderer<R extends object = Row> = (row: R) => string;

export interface ColumnOptions<R extends object = Row> {
  field?: string;
  label?: string;
  sortable?: boolean;
  direction?: SortDirection;
  renderer?: CellRenderer<R>;
}

/**
 * The ways a column can be configured. Labels not given explicitly are
 * derived from the field name.
 */
export type ColumnSpec<R extends object = Row> =
  | {kind: 'field'; field: string}
  | {kind: 'options'; options: ColumnOptions<R> & {field: string}}
  | {kind: 'field-label'; field: string; label: string}
  | {kind: 'field-options'; field: string; options: ColumnOptions<R>}
  | {kind: 'field-label-renderer'; field: string; label: string; renderer: CellRenderer<R>};

export type ColumnSpecKind = ColumnSpec['kind'];

export const RENDERER_MESSAGE = 'Callable function not provided';

export function isCellRenderer<R extends object>(value: unknown): value is CellRenderer<R> {
  return typeof value === 'function';
}

// =============================================================================
// Runtime validation
// =============================================================================

const FieldSchema = z.string().min(1, 'field must not be empty');

const RendererSchema = z.custom<CellRenderer<never>>(
  (value) => typeof value === 'function',
  {message: RENDERER_MESSAGE},
);

export const ColumnOptionsSchema = z.object({
  field: FieldSchema.optional(),
  label: z.string().optional(),
  sortable: z.boolean().optional(),
  direction: SortDirectionSchema.optional(),
  renderer: RendererSchema.optional(),
}).strict();

export const ColumnSpecSchema = z.discriminatedUnion('kind', [
  z.object({kind: z.literal('field'), field: FieldSchema}).strict(),
  z.object({kind: z.literal('options'), options: ColumnOptionsSchema.extend({field: FieldSchema})}).strict(),
  z.object({kind: z.literal('field-label'), field: FieldSchema, label: z.string()}).strict(),
  z.object({kind: z.literal('field-options'), field: FieldSchema, options: ColumnOptionsSchema}).strict(),
  z.object({
    kind: z.literal('field-label-renderer'),
    field: FieldSchema,
    label: z.string(),
    renderer: RendererSchema,
  }).strict(),
]);

export function isRendererIssue(error: z.ZodError): boolean {
  return error.issues.some((issue) => issue.path[issue.path.length - 1] === 'renderer');
}
