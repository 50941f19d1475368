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


import SimpleVocabulary, { SimpleVocabularyOptions } from './simple_vocabulary';
import { Vocabulary } from './types';

/**
 * A dialogue act, together with the slots it affects.
 */
export interface ActionRecord {
    act : string;
    slots ?: string[];
}

export type ActionLike = ActionRecord|string;

function formatAction(action : ActionLike) : string {
    if (typeof action === 'string')
        return action;
    return action.act;
}

function flatten<T>(batch : Iterable<Iterable<T>>) : T[] {
    const flat : T[] = [];
    for (const sequence of batch) {
        for (const item of sequence)
            flat.push(item);
    }
    return flat;
}

/**
 * A vocabulary of action names, built from and looked up with action
 * records (or plain action names).
 *
 * Lookups flatten one level of the batch, so the result is always a batch
 * with a single sequence.
 */
export default class ActionVocabulary implements Vocabulary<ActionLike> {
    private _vocab : SimpleVocabulary;

    constructor(options : SimpleVocabularyOptions = {}) {
        this._vocab = new SimpleVocabulary(options);
    }

    get size() : number {
        return this._vocab.size;
    }

    has(action : string) : boolean {
        return this._vocab.has(action);
    }

    keys() : string[] {
        return this._vocab.keys();
    }

    /**
     * Rebuild the vocabulary from batches of per-utterance action lists.
     */
    fit(...batches : Array<Iterable<Iterable<ActionLike>>>) : void {
        const actions : string[] = [];
        for (const batch of batches)
            actions.push(...flatten(batch).map(formatAction));
        this._vocab.fit([actions]);
    }

    encode(batch : ReadonlyArray<ReadonlyArray<ActionLike>>) : number[][] {
        return this._vocab.encode([flatten<ActionLike>(batch).map(formatAction)]);
    }

    decode(batch : ReadonlyArray<ReadonlyArray<number>>) : string[][] {
        return this._vocab.decode([flatten(batch)]);
    }
}
