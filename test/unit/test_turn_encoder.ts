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

import TurnEncoder, { fitVocabularies } from '../../lib/dataset-tools/turn_encoder';
import { TurnExample } from '../../lib/dataset-tools/parsers';

const TURNS : TurnExample[] = [
    {
        id: '1',
        tokens: ['I', 'want', 'Paris', 'Texas'],
        tags: ['O', 'O', 'B-city', 'I-city'],
        candidates: { city: ['Paris Texas', 'London'], food: ['steak'] },
        slots: { city: 'Paris Texas' },
        actions: [{ act: 'inform', slots: ['city'] }]
    },
    {
        id: '2',
        tokens: ['cheap', 'steak'],
        tags: ['O', 'B-food'],
        slots: [{ slot: 'food', value: 'steak', score: 0.5 }],
        actions: [{ act: 'request', slots: ['food', 'area'] }]
    },
];

async function testFitVocabularies() {
    const { slotVocab, actionVocab } = fitVocabularies(TURNS);
    assert.deepStrictEqual(slotVocab.keys(), ['city', 'food', 'area']);
    assert.deepStrictEqual(actionVocab.keys(), ['inform', 'request']);

    const fixed = fitVocabularies(TURNS, { slots: ['food', 'city', 'area', 'name'] });
    assert.deepStrictEqual(fixed.slotVocab.keys(), ['food', 'city', 'area', 'name']);
}

async function testTurnEncoder() {
    const { slotVocab, actionVocab } = fitVocabularies(TURNS);
    const encoder = new TurnEncoder({ slotVocab, actionVocab, maxNumValues: 2 });

    assert.deepStrictEqual(encoder.encode(TURNS[0]), {
        id: '1',
        delexicalized: ['I', 'want', '#city', '#city'],
        slotTokens: [
            [0, 0, 1, 1],
            [0, 0, 0, 0],
            [0, 0, 0, 0]
        ],
        slotValues: [
            [1, 0, 0, 0],
            [0, 0, 0, 0],
            [0, 0, 0, 0]
        ],
        slotActions: [
            [1, 0],
            [0, 0],
            [0, 0]
        ]
    });

    // without candidates, slots are encoded as presence masks
    assert.deepStrictEqual(encoder.encode(TURNS[1]), {
        id: '2',
        delexicalized: ['cheap', '#food'],
        slotTokens: [
            [0, 0],
            [0, 1],
            [0, 0]
        ],
        slotValues: [
            [0, 0, 0, 0],
            [0.5, 0, 0, 0],
            [0, 0, 0, 0]
        ],
        slotActions: [
            [0, 0],
            [0, 1],
            [0, 1]
        ]
    });
}

async function testTurnEncoderInMaskMode() {
    const { slotVocab, actionVocab } = fitVocabularies(TURNS);
    const encoder = new TurnEncoder({ slotVocab, actionVocab, maxNumValues: 2, mask: true });

    const encoded = encoder.encode({
        id: '3',
        tokens: ['Paris', 'Texas'],
        tags: ['B-city', 'I-city'],
        candidates: { city: ['Paris Texas'] }
    });
    assert.deepStrictEqual(encoded, {
        id: '3',
        delexicalized: ['#city', '#city'],
        slotTokens: [
            [1, 0],
            [0, 0],
            [0, 0]
        ]
    });
}

export default async function main() {
    await testFitVocabularies();
    await testTurnEncoder();
    await testTurnEncoderInMaskMode();
}
if (!module.parent)
    main();
