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


import { checkParallel, iterateSpans } from './bio';
import { zeros } from './matrix';
import { getCandidates, logSlotVocabulary, resolveSlot, unwrapCandidates } from './resolve';
import { CandidateMismatchError } from '../errors';
import { Vocabulary } from '../vocab/types';
import { CandidateBatch, Matrix } from './types';

/**
 * Build one `[numSlots, numTokens]` matrix per BIO-tagged utterance.
 *
 * With a candidate set, every column of a slot span holds the index of the
 * span's value among the candidates of the slot, plus one (0 means no
 * slot). Without one, the first column of each span holds 1.
 */
export default class SlotTokenMatrixBuilder {
    private _slotVocab : Vocabulary;

    constructor(slotVocab : Vocabulary) {
        logSlotVocabulary(slotVocab);
        this._slotVocab = slotVocab;
    }

    build(utterances : ReadonlyArray<readonly string[]>,
          tags : ReadonlyArray<readonly string[]>,
          candidateBatch : CandidateBatch|null = null) : Matrix[] {
        checkParallel(utterances, tags);
        const candidates = candidateBatch !== null ? unwrapCandidates(candidateBatch) : null;

        return utterances.map((words, i) => {
            const uttTags = tags[i];
            const matrix = zeros(this._slotVocab.size, uttTags.length);

            for (const { slot, start, length } of iterateSpans(uttTags)) {
                if (candidates !== null) {
                    const value = words.slice(start, start + length).join(' ');
                    const slotCandidates = getCandidates(candidates, slot);
                    if (slotCandidates === undefined)
                        throw new CandidateMismatchError(slot);
                    const valueIdx = slotCandidates.indexOf(value);
                    if (valueIdx < 0)
                        throw new CandidateMismatchError(slot, value);

                    const row = matrix[resolveSlot(this._slotVocab, slot)];
                    row.fill(valueIdx + 1, start, start + length);
                } else {
                    matrix[resolveSlot(this._slotVocab, slot)][start] = 1;
                }
            }
            return matrix;
        });
    }
}
