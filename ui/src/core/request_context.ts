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

// Parsed query strings, in the shape mithril's query helpers read and write.
export type QueryParams = m.Params;

/**
 * The parts of the current request that sorting and link generation read.
 * Never mutated by this package.
 */
export interface RequestContext {
  readonly path: string;
  readonly query: QueryParams;
  // Prefix for generated links, e.g. 'https://example.test'. Links are
  // root-relative when absent.
  readonly baseUrl?: string;
}

/**
 * Build a context from a request target such as `/games?sort=name`
 * (the shape of a Node request's `url`).
 */
export function requestContextFromUrl(url: string, baseUrl?: string): RequestContext {
  const {path, params} = m.parsePathname(url);
  return {path, query: params, baseUrl};
}

/**
 * Reads a single string parameter. Empty strings, repeated keys and values
 * the query parser turned into booleans all count as absent.
 */
export function readQueryValue(query: QueryParams, key: string): string | undefined {
  const value = query[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Returns `query` with the keys of `replacements` removed and then appended
 * in order. Undefined replacements drop the key.
 */
export function mergeQuery(query: QueryParams, replacements: QueryParams): QueryParams {
  const merged: QueryParams = {};
  for (const [key, value] of Object.entries(query)) {
    if (!(key in replacements)) {
      merged[key] = value;
    }
  }
  for (const [key, value] of Object.entries(replacements)) {
    if (value !== undefined && value !== null && value !== '') {
      merged[key] = value;
    }
  }
  return merged;
}

export function buildUrl(ctx: RequestContext, query: QueryParams): string {
  const base = (ctx.baseUrl ?? '').replace(/\/+$/, '');
  const queryString = m.buildQueryString(query);
  return `${base}${ctx.path}${queryString ? '?' + queryString : ''}`;
}
