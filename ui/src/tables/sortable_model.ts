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
import {TableError, describeIssues} from '../core/table_errors';

/**
 * What a data source declares about its own ordering: the fields a user may
 * sort by and the one used when the request names none.
 */
export interface SortableModel {
  readonly sortable: readonly string[];
  readonly defaultSortField?: string;
}

const SortableModelSchema = z.object({
  sortable: z.array(z.string().min(1)),
  defaultSortField: z.string().min(1).optional(),
}).refine(
  (model) => model.defaultSortField === undefined || model.sortable.includes(model.defaultSortField),
  {message: 'defaultSortField must be one of the sortable fields', path: ['defaultSortField']},
);

export function defineSortableModel(sortable: readonly string[], defaultSortField?: string): SortableModel {
  const result = SortableModelSchema.safeParse({sortable: [...sortable], defaultSortField});
  if (!result.success) {
    throw new TableError(`Invalid sortable model: ${describeIssues(result.error, 'model')}`);
  }
  return Object.freeze({
    sortable: Object.freeze(result.data.sortable),
    defaultSortField: result.data.defaultSortField,
  });
}

export function isSortableField(model: SortableModel | undefined, field: string): boolean {
  return model !== undefined && model.sortable.includes(field);
}
