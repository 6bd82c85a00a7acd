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
import {JSDOM} from 'jsdom';

let sharedDocument: Document | undefined;

function getDocument(): Document {
  if (!sharedDocument) {
    sharedDocument = new JSDOM('').window.document;
  }
  return sharedDocument;
}

/**
 * Render vnodes into a detached element and return its markup. Text is
 * escaped by the serializer; only m.trust() content is emitted verbatim.
 */
export function renderToHtml(vnodes: m.Children): string {
  const container = getDocument().createElement('div');
  m.render(container, vnodes);
  return container.innerHTML;
}
