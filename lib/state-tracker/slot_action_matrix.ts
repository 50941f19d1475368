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


import { UnknownActionError } from '../errors';
import { ActionRecord } from '../vocab/action_vocabulary';
import { Vocabulary } from '../vocab/types';
import { zeros } from './matrix';
import { resolveSlot } from './resolve';
import { Matrix } from './types';

/**
 * Build one `[numSlots, numActions]` mask per utterance, marking which
 * slots each action of the utterance affects.
 */
export default class SlotActionMatrixBuilder {
    private _slotVocab : Vocabulary;
    private _actionVocab : Vocabulary;

    constructor(slotVocab : Vocabulary, actionVocab : Vocabulary) {
        this._slotVocab = slotVocab;
        this._actionVocab = actionVocab;
    }

    private _actionToIndex(action : string) : number {
        if (!this._actionVocab.has(action))
            throw new UnknownActionError(action);
        return this._actionVocab.encode([[action]])[0][0];
    }

    build(actions : ReadonlyArray<ReadonlyArray<ActionRecord>>) : Matrix[] {
        return actions.map((uttActions) => {
            const matrix = zeros(this._slotVocab.size, this._actionVocab.size);
            for (const action of uttActions) {
                const column = this._actionToIndex(action.act);
                for (const slot of action.slots || [])
                    matrix[resolveSlot(this._slotVocab, slot)][column] = 1;
            }
            return matrix;
        });
    }
}
