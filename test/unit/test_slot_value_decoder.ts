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

import SimpleVocabulary from '../../lib/vocab/simple_vocabulary';
import SlotValueMatrixDecoder from '../../lib/state-tracker/slot_value_decoder';
import SlotValueMatrixBuilder from '../../lib/state-tracker/slot_value_matrix';
import { argmaxRows } from '../../lib/state-tracker/matrix';
import { SlotDict } from '../../lib/state-tracker/types';
import { CandidateMismatchError, ShapeMismatchError, UnsupportedBatchShapeError } from '../../lib/errors';

function makeSlotVocab() {
    const vocab = new SimpleVocabulary();
    vocab.fit([['city', 'food']]);
    return vocab;
}

const CANDIDATES = {
    city: ['Paris Texas', 'London'],
    food: ['steak'],
};

const TEST_CASES : Array<[number[], SlotDict]> = [
    [[1, 0], { city: 'London', food: 'steak' }],
    [[0, 0], { city: 'Paris Texas', food: 'steak' }],

    // out of range indices read as 0
    [[2, 1], { city: 'Paris Texas', food: 'steak' }],
    [[-1, 7], { city: 'Paris Texas', food: 'steak' }],
    [[0.5, 0], { city: 'Paris Texas', food: 'steak' }],
];

async function testDecode() {
    const decoder = new SlotValueMatrixDecoder(makeSlotVocab());
    for (const [values, expected] of TEST_CASES)
        assert.deepStrictEqual(decoder.decode(values, [CANDIDATES]), [expected], values.join(' '));
}

async function testExcludedValuesAreLeftOut() {
    const decoder = new SlotValueMatrixDecoder(makeSlotVocab(), ['none', 'dontcare']);
    const candidates = { city: ['none', 'London'], food: ['dontcare', 'steak'] };

    assert.deepStrictEqual(decoder.decode([0, 1], [candidates]), [{ food: 'steak' }]);
    assert.deepStrictEqual(decoder.decode([1, 0], [candidates]), [{ city: 'London' }]);
    assert.deepStrictEqual(decoder.decode([0, 5], [candidates]), [{}]);
}

async function testErrors() {
    const decoder = new SlotValueMatrixDecoder(makeSlotVocab());

    assert.throws(() => decoder.decode([0, 0], [CANDIDATES, CANDIDATES]), UnsupportedBatchShapeError);
    assert.throws(() => decoder.decode([0], [CANDIDATES]), ShapeMismatchError);
    assert.throws(() => decoder.decode([0, 0], [{ city: ['London'] }]), (e : unknown) => {
        assert(e instanceof CandidateMismatchError);
        assert.strictEqual(e.slot, 'food');
        return true;
    });
    assert.throws(() => decoder.decode([0, 0], [{ city: ['London'], food: [] }]), CandidateMismatchError);
}

async function testEncodingAndDecodingASlotDictGivesItBack() {
    const slotVocab = makeSlotVocab();
    const builder = new SlotValueMatrixBuilder(slotVocab, 2);
    const decoder = new SlotValueMatrixDecoder(slotVocab);

    const candidates = { city: ['Paris Texas', 'London'], food: ['fish', 'steak'] };
    for (const slots of [{ city: 'London', food: 'steak' }, { city: 'Paris Texas', food: 'fish' }]) {
        const [matrix] = builder.build([slots], [candidates]);
        assert.deepStrictEqual(decoder.decode(argmaxRows(matrix), [candidates]), [slots]);
    }
}

export default async function main() {
    await testDecode();
    await testExcludedValuesAreLeftOut();
    await testErrors();
    await testEncodingAndDecodingASlotDictGivesItBack();
}
if (!module.parent)
    main();
