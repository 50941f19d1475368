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


import SimpleVocabulary, { SimpleVocabularyOptions } from '../vocab/simple_vocabulary';
import ActionVocabulary from '../vocab/action_vocabulary';
import { Vocabulary } from '../vocab/types';
import Delexicalizer from '../state-tracker/delexicalizer';
import SlotTokenMatrixBuilder from '../state-tracker/slot_token_matrix';
import SlotValueMatrixBuilder, { toRecords } from '../state-tracker/slot_value_matrix';
import SlotActionMatrixBuilder from '../state-tracker/slot_action_matrix';
import { iterateSpans } from '../state-tracker/bio';
import { Matrix } from '../state-tracker/types';
import { TurnExample } from './parsers';

export interface EncodedTurn {
    id : string;
    delexicalized : string[];
    slotTokens : Matrix;
    slotValues ?: Matrix;
    slotActions ?: Matrix;
}

export interface TurnEncoderOptions {
    slotVocab : Vocabulary;
    actionVocab : Vocabulary;
    maxNumValues : number;
    /**
     * Build slot presence masks even for turns that carry candidates.
     */
    mask ?: boolean;
}

/**
 * Run every encoder over one dataset turn.
 */
export default class TurnEncoder {
    private _mask : boolean;
    private _delexicalizer : Delexicalizer;
    private _tokenBuilder : SlotTokenMatrixBuilder;
    private _valueBuilder : SlotValueMatrixBuilder;
    private _actionBuilder : SlotActionMatrixBuilder;

    constructor(options : TurnEncoderOptions) {
        this._mask = !!options.mask;
        this._delexicalizer = new Delexicalizer();
        this._tokenBuilder = new SlotTokenMatrixBuilder(options.slotVocab);
        this._valueBuilder = new SlotValueMatrixBuilder(options.slotVocab, options.maxNumValues);
        this._actionBuilder = new SlotActionMatrixBuilder(options.slotVocab, options.actionVocab);
    }

    encode(turn : TurnExample) : EncodedTurn {
        const candidates = turn.candidates;
        const encoded : EncodedTurn = {
            id: turn.id,
            delexicalized: this._delexicalizer.delexicalize([turn.tokens], [turn.tags])[0],
            slotTokens: this._tokenBuilder.build([turn.tokens], [turn.tags],
                this._mask || candidates === undefined ? null : [candidates])[0],
        };
        if (turn.slots !== undefined)
            encoded.slotValues = this._valueBuilder.build([turn.slots], [candidates || {}])[0];
        if (turn.actions !== undefined)
            encoded.slotActions = this._actionBuilder.build([turn.actions])[0];
        return encoded;
    }
}

export interface FitOptions {
    /**
     * Use exactly these slots, in this order, instead of the slots found
     * in the data.
     */
    slots ?: string[];
    slotVocabOptions ?: SimpleVocabularyOptions;
    actionVocabOptions ?: SimpleVocabularyOptions;
}

/**
 * Fit the slot and action vocabularies on a dataset.
 *
 * Slot names come from the tagged spans, the slot values and the slots
 * affected by each action.
 */
export function fitVocabularies(turns : readonly TurnExample[], options : FitOptions = {}) : {
    slotVocab : SimpleVocabulary;
    actionVocab : ActionVocabulary;
} {
    const slotVocab = new SimpleVocabulary(options.slotVocabOptions);
    if (options.slots) {
        slotVocab.fit([options.slots]);
    } else {
        const slotSequences = turns.map((turn) => {
            const slots = Array.from(iterateSpans(turn.tags), (span) => span.slot);
            if (turn.slots !== undefined)
                slots.push(...toRecords(turn.slots).map((record) => record.slot));
            for (const action of turn.actions || [])
                slots.push(...(action.slots || []));
            return slots;
        });
        slotVocab.fit(slotSequences);
    }

    const actionVocab = new ActionVocabulary(options.actionVocabOptions);
    actionVocab.fit(turns.map((turn) => turn.actions || []));
    return { slotVocab, actionVocab };
}
