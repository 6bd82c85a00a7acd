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

import {describe, it, expect} from '@jest/globals';

import {formatCellValue, labelFromField, readField} from './formatters';

describe('labelFromField', () => {
  it('capitalises words split on underscores', () => {
    expect(labelFromField('created_at')).toBe('Created At');
    expect(labelFromField('first_name_initial')).toBe('First Name Initial');
  });

  it('capitalises a single word', () => {
    expect(labelFromField('id')).toBe('Id');
  });

  it('leaves the rest of each word alone', () => {
    expect(labelFromField('userID')).toBe('UserID');
  });
});

describe('formatCellValue', () => {
  it('renders absent values as empty text', () => {
    expect(formatCellValue(null)).toBe('');
    expect(formatCellValue(undefined)).toBe('');
  });

  it('renders primitives as text', () => {
    expect(formatCellValue('Terraria')).toBe('Terraria');
    expect(formatCellValue(42)).toBe('42');
    expect(formatCellValue(10n)).toBe('10');
    expect(formatCellValue(true)).toBe('true');
  });

  it('renders dates as ISO strings', () => {
    expect(formatCellValue(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
    expect(formatCellValue(new Date('not a date'))).toBe('');
  });

  it('renders objects as JSON', () => {
    expect(formatCellValue({platform: 'pc'})).toBe('{"platform":"pc"}');
  });
});

describe('readField', () => {
  it('reads getters of class instances', () => {
    class Game {
      constructor(private readonly title: string) {}
      get name(): string {
        return this.title.toUpperCase();
      }
    }

    expect(readField(new Game('celeste'), 'name')).toBe('CELESTE');
    expect(readField({id: 3}, 'missing')).toBeUndefined();
  });
});
