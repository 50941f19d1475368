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

import { NO_VALUE_INDEX } from '../config';
import { CandidateMismatchError, ShapeMismatchError } from '../errors';
import { Vocabulary } from '../vocab/types';
import { getCandidates, resolveSlotName, unwrapCandidates } from './resolve';
import { CandidateSet, SlotDict } from './types';

const logger = getLogger('slotcodec.state-tracker');

/**
 * Convert a vector of per-slot value indices back into a slot dict.
 *
 * Position `i` of the vector holds the candidate index of the value of the
 * slot at row `i` of the slot vocabulary. Indices outside the candidate
 * list of the slot are read as 0. Values listed in `excludeValues` (such
 * as "none" or "dontcare") are left out of the result.
 */
export default class SlotValueMatrixDecoder {
    private _slotVocab : Vocabulary;
    private _excludeValues : Set<string>;

    constructor(slotVocab : Vocabulary, excludeValues : Iterable<string> = []) {
        this._slotVocab = slotVocab;
        this._excludeValues = new Set(excludeValues);
    }

    private _indexToValue(slot : string, index : number, candidates : CandidateSet) : string {
        const slotCandidates = getCandidates(candidates, slot);
        if (slotCandidates === undefined || slotCandidates.length === 0)
            throw new CandidateMismatchError(slot);

        if (!Number.isInteger(index) || index < 0 || index >= slotCandidates.length) {
            logger.debug(`index ${index} is out of range for the ${slotCandidates.length} candidates of slot '${slot}'`);
            index = NO_VALUE_INDEX;
        }
        return slotCandidates[index];
    }

    decode(values : readonly number[], candidateBatch : ReadonlyArray<CandidateSet>) : [SlotDict] {
        const candidates = unwrapCandidates(candidateBatch);
        if (values.length !== this._slotVocab.size)
            throw new ShapeMismatchError(`expected ${this._slotVocab.size} slot values, got ${values.length}`);

        const entries : Array<[string, string]> = [];
        values.forEach((index, slotIdx) => {
            const slot = resolveSlotName(this._slotVocab, slotIdx);
            const value = this._indexToValue(slot, index, candidates);
            if (!this._excludeValues.has(value))
                entries.push([slot, value]);
        });
        const slotDict : SlotDict = Object.fromEntries(entries);
        return [slotDict];
    }
}
