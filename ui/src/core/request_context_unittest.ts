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

import {
  buildUrl,
  mergeQuery,
  readQueryValue,
  requestContextFromUrl,
} from './request_context';

describe('requestContextFromUrl', () => {
  it('splits the path from the query', () => {
    const ctx = requestContextFromUrl('/games?sort=name&direction=asc');

    expect(ctx.path).toBe('/games');
    expect(ctx.query).toEqual({sort: 'name', direction: 'asc'});
    expect(ctx.baseUrl).toBeUndefined();
  });

  it('decodes query values', () => {
    const ctx = requestContextFromUrl('/games?q=Mario%20Kart', 'https://example.test');

    expect(ctx.query).toEqual({q: 'Mario Kart'});
    expect(ctx.baseUrl).toBe('https://example.test');
  });

  it('has an empty query without a query string', () => {
    expect(requestContextFromUrl('/games').query).toEqual({});
  });
});

describe('readQueryValue', () => {
  it('returns non-empty strings only', () => {
    const {query} = requestContextFromUrl('/games?sort=name&direction=&flag=true');

    expect(readQueryValue(query, 'sort')).toBe('name');
    expect(readQueryValue(query, 'direction')).toBeUndefined();
    expect(readQueryValue(query, 'flag')).toBeUndefined();
    expect(readQueryValue(query, 'missing')).toBeUndefined();
  });
});

describe('mergeQuery', () => {
  it('moves replaced keys to the end', () => {
    const merged = mergeQuery({sort: 'id', page: '2', direction: 'asc'}, {sort: 'name', direction: 'desc'});

    expect(Object.entries(merged)).toEqual([
      ['page', '2'],
      ['sort', 'name'],
      ['direction', 'desc'],
    ]);
  });

  it('drops keys replaced by empty values', () => {
    expect(mergeQuery({page: '2', sort: 'id'}, {sort: undefined, direction: ''})).toEqual({page: '2'});
  });
});

describe('buildUrl', () => {
  it('omits the question mark without parameters', () => {
    expect(buildUrl({path: '/games', query: {}}, {})).toBe('/games');
  });

  it('encodes parameter values', () => {
    expect(buildUrl({path: '/games', query: {}}, {q: 'Mario Kart'})).toBe('/games?q=Mario%20Kart');
  });

  it('joins the base URL without doubling slashes', () => {
    expect(buildUrl({path: '/games', query: {}, baseUrl: 'https://example.test//'}, {page: '3'}))
      .toBe('https://example.test/games?page=3');
  });

  it('writes back values the query parser produced', () => {
    const ctx = requestContextFromUrl('/games?flag=true&page=2');

    expect(buildUrl(ctx, mergeQuery(ctx.query, {sort: 'name'}))).toBe('/games?flag=true&page=2&sort=name');
  });
});
