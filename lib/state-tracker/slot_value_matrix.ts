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


import { getLogger } from 'log4js';

import { DEFAULT_SCORE, NO_VALUE_INDEX } from '../config';
import { ShapeMismatchError } from '../errors';
import { Vocabulary } from '../vocab/types';
import { zeros } from './matrix';
import { getCandidates, resolveSlot, unwrapCandidates } from './resolve';
import { CandidateSet, Matrix, SlotDict, SlotRecord, SlotsInput } from './types';

const logger = getLogger('slotcodec.state-tracker');

function isRecordList(slots : SlotsInput) : slots is ReadonlyArray<SlotRecord> {
    return Array.isArray(slots);
}

export function toRecords(slots : SlotsInput) : ReadonlyArray<SlotRecord> {
    if (isRecordList(slots))
        return slots;
    const dict : Readonly<SlotDict> = slots;
    return Object.keys(dict).map((slot) => ({ slot, value: dict[slot] }));
}

/**
 * Build one `[numSlots, maxNumValues + 2]` score matrix per utterance from
 * its slot values.
 *
 * Values are placed in the column of their index among the candidates of
 * the slot. Values that are not among the candidates (and slots with no
 * candidates at all) fall back to the "no value" column instead of failing.
 */
export default class SlotValueMatrixBuilder {
    private _slotVocab : Vocabulary;
    private _maxNumValues : number;

    constructor(slotVocab : Vocabulary, maxNumValues : number) {
        if (!Number.isInteger(maxNumValues) || maxNumValues < 0)
            throw new RangeError(`maxNumValues must be a non-negative integer, got ${maxNumValues}`);
        this._slotVocab = slotVocab;
        this._maxNumValues = maxNumValues;
    }

    get numColumns() : number {
        return this._maxNumValues + 2;
    }

    private _valueToIndex(slot : string, value : string, candidates : CandidateSet) : number {
        const slotCandidates = getCandidates(candidates, slot);
        const index = slotCandidates !== undefined ? slotCandidates.indexOf(value) : -1;
        if (index < 0) {
            logger.debug(`value '${value}' of slot '${slot}' doesn't match any candidate, using the no-value column`);
            return NO_VALUE_INDEX;
        }
        if (index >= this.numColumns)
            throw new ShapeMismatchError(`value '${value}' of slot '${slot}' has candidate index ${index}, beyond the ${this.numColumns} value columns`);
        return index;
    }

    build(slots : ReadonlyArray<SlotsInput>, candidateBatch : ReadonlyArray<CandidateSet>) : Matrix[] {
        const candidates = unwrapCandidates(candidateBatch);

        return slots.map((uttSlots) => {
            const matrix = zeros(this._slotVocab.size, this.numColumns);
            for (const record of toRecords(uttSlots)) {
                const row = resolveSlot(this._slotVocab, record.slot);
                const column = this._valueToIndex(record.slot, record.value, candidates);
                matrix[row][column] = typeof record.score === 'number' ? record.score : DEFAULT_SCORE;
            }
            return matrix;
        });
    }
}
