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


import assert from 'assert';

import { checkParallel, extractSpans, tagToSlot } from '../../lib/state-tracker/bio';
import { SlotSpan } from '../../lib/state-tracker/types';
import { FormatError, ShapeMismatchError } from '../../lib/errors';

const TEST_CASES : Array<[string[], SlotSpan[]]> = [
    [[], []],
    [['O', 'O', 'O'], []],
    [['O', 'O', 'B-city', 'I-city'], [{ slot: 'city', start: 2, length: 2 }]],
    [['B-area', 'I-area', 'O', 'B-food', 'I-food', 'I-food'], [
        { slot: 'area', start: 0, length: 2 },
        { slot: 'food', start: 3, length: 3 }
    ]],

    // a B- tag of the same slot starts a new span
    [['B-city', 'B-city'], [
        { slot: 'city', start: 0, length: 1 },
        { slot: 'city', start: 1, length: 1 }
    ]],

    // an I- tag of a different slot starts a new span
    [['B-city', 'I-food'], [
        { slot: 'city', start: 0, length: 1 },
        { slot: 'food', start: 1, length: 1 }
    ]],

    // a leading I- tag opens a span too
    [['O', 'I-city', 'I-city', 'O'], [{ slot: 'city', start: 1, length: 2 }]],

    [['B-price range', 'I-price range'], [{ slot: 'price range', start: 0, length: 2 }]],
];

async function testExtractSpans() {
    for (const [tags, expected] of TEST_CASES)
        assert.deepStrictEqual(extractSpans(tags), expected, tags.join(' '));
}

async function testExtractedSpansAreOrderedAndDoNotOverlap() {
    for (const [tags] of TEST_CASES) {
        const spans = extractSpans(tags);
        let end = 0;
        let total = 0;
        for (const span of spans) {
            assert(span.start >= end);
            assert(span.length >= 1);
            end = span.start + span.length;
            total += span.length;
        }
        assert(end <= tags.length);
        assert(total <= tags.length);
    }
}

async function testTagToSlot() {
    assert.strictEqual(tagToSlot('O'), null);
    assert.strictEqual(tagToSlot('B-city'), 'city');
    assert.strictEqual(tagToSlot('I-city'), 'city');
}

async function testMalformedTagsAreRejected() {
    assert.throws(() => tagToSlot('X-city'), FormatError);
    assert.throws(() => extractSpans(['O', 'X-city']), {
        name: 'FormatError',
        code: 'EBADTAG',
        message: 'Wrong tag format: X-city'
    });

    // the span closes on the malformed tag, which then fails on its own
    assert.throws(() => extractSpans(['B-city', 'city']), {
        code: 'EBADTAG',
        message: 'Wrong tag format: city'
    });
}

async function testCheckParallel() {
    checkParallel([['a', 'b']], [['O', 'O']]);
    assert.throws(() => checkParallel([['a', 'b']], []), ShapeMismatchError);
    assert.throws(() => checkParallel([['a', 'b']], [['O']]), {
        code: 'ESHAPE',
        message: 'utterance #0 has 2 tokens but 1 tags'
    });
}

export default async function main() {
    await testExtractSpans();
    await testExtractedSpansAreOrderedAndDoNotOverlap();
    await testTagToSlot();
    await testMalformedTagsAreRejected();
    await testCheckParallel();
}
if (!module.parent)
    main();
