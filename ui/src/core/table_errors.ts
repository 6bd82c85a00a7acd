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

import {ZodError} from 'zod';

export class TableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Thrown when a column cannot be built from the configuration it was given. */
export class ColumnConfigurationError extends TableError {}

export class InvalidRendererError extends ColumnConfigurationError {
  constructor(message = 'Callable function not provided') {
    super(message);
  }
}

export class TableSettingsError extends TableError {}

/**
 * Flattens zod issues into a single line, e.g.
 * `options.direction: Invalid enum value; field: Required`.
 */
export function describeIssues(error: ZodError, root = 'value'): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : root}: ${issue.message}`)
    .join('; ');
}
