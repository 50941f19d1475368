// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// This file is part of slotcodec
//
// Copyright 2026 The slotcodec Authors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//    http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.


import { BIO_PREFIXES, INSIDE_PREFIX, OUTSIDE_TAG } from '../config';
import { FormatError, ShapeMismatchError } from '../errors';
import { SlotSpan } from './types';

/**
 * Compute the slot name of a BIO tag, or `null` for the outside tag.
 *
 * `B-` and `I-` tags are treated the same.
 */
export function tagToSlot(tag : string) : string|null {
    if (tag === OUTSIDE_TAG)
        return null;
    if (!BIO_PREFIXES.some((prefix) => tag.startsWith(prefix)))
        throw new FormatError(tag);
    return tag.substring(2);
}

/**
 * Iterate the slot spans of a tag sequence, in order.
 *
 * Any non-outside tag opens a new span (a leading `I-` tag included); the
 * span then extends for as long as the following tag is exactly
 * `I-<slot>`. A different slot, an outside tag, or a `B-` tag of the same
 * slot closes it.
 */
export function* iterateSpans(tags : readonly string[]) : Generator<SlotSpan, void> {
    let i = 0;
    while (i < tags.length) {
        const slot = tagToSlot(tags[i]);
        if (slot === null) {
            i ++;
            continue;
        }

        let length = 1;
        while (i + length < tags.length && tags[i + length] === INSIDE_PREFIX + slot)
            length ++;
        yield { slot, start: i, length };
        i += length;
    }
}

export function extractSpans(tags : readonly string[]) : SlotSpan[] {
    return Array.from(iterateSpans(tags));
}

/**
 * Check that a batch of utterances and a batch of tag sequences line up,
 * utterance by utterance and token by token.
 */
export function checkParallel(utterances : ReadonlyArray<readonly string[]>,
                              tags : ReadonlyArray<readonly string[]>) : void {
    if (utterances.length !== tags.length)
        throw new ShapeMismatchError(`got ${utterances.length} utterances but ${tags.length} tag sequences`);
    for (let i = 0; i < utterances.length; i++) {
        if (utterances[i].length !== tags[i].length)
            throw new ShapeMismatchError(`utterance #${i} has ${utterances[i].length} tokens but ${tags[i].length} tags`);
    }
}
