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

import { UnknownSlotError, UnsupportedBatchShapeError } from '../errors';
import { Vocabulary } from '../vocab/types';
import { CandidateSet } from './types';

const logger = getLogger('slotcodec.state-tracker');

/**
 * Extract the candidate set of the current turn from its batch.
 *
 * Batches of more than one turn are not supported.
 */
export function unwrapCandidates<T>(batch : ReadonlyArray<T>) : T {
    if (batch.length !== 1)
        throw new UnsupportedBatchShapeError(batch.length);
    return batch[0];
}

export function getCandidates(candidates : CandidateSet, slot : string) : readonly string[]|undefined {
    if (!Object.prototype.hasOwnProperty.call(candidates, slot))
        return undefined;
    return candidates[slot];
}

/**
 * Map a slot name to its row in the slot matrices.
 */
export function resolveSlot(slotVocab : Vocabulary, slot : string) : number {
    if (!slotVocab.has(slot))
        throw new UnknownSlotError(slot);
    return slotVocab.encode([[slot]])[0][0];
}

/**
 * Map a row of the slot matrices back to its slot name.
 */
export function resolveSlotName(slotVocab : Vocabulary, index : number) : string {
    return slotVocab.decode([[index]])[0][0];
}

export function slotNames(slotVocab : Vocabulary) : string[] {
    const indices : number[] = [];
    for (let i = 0; i < slotVocab.size; i++)
        indices.push(i);
    return slotVocab.decode([indices])[0];
}

export function logSlotVocabulary(slotVocab : Vocabulary) : void {
    if (logger.isInfoEnabled())
        logger.info(`Found vocabulary with the following slot names: ${slotNames(slotVocab).join(', ')}`);
}
