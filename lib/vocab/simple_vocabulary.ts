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

import { UnknownTokenError } from '../errors';
import { Vocabulary } from './types';

const logger = getLogger('slotcodec.vocab');

export interface SimpleVocabularyOptions {
    /**
     * Tokens that always occupy the first indices, in order.
     */
    specialTokens ?: string[];
    /**
     * Token returned for unknown tokens and unknown indices. It is added
     * to the special tokens if it is not among them already.
     *
     * If not set, looking up an unknown token or index throws.
     */
    unkToken ?: string;
    minFreq ?: number;
    maxTokens ?: number;
}

/**
 * A vocabulary built from observed data.
 *
 * Special tokens come first, followed by the observed tokens by decreasing
 * frequency (ties keep the order in which tokens were first seen).
 */
export default class SimpleVocabulary implements Vocabulary<string> {
    private _specialTokens : string[];
    private _unkToken : string|null;
    private _minFreq : number;
    private _maxTokens : number;

    private _t2i : Map<string, number>;
    private _i2t : string[];
    freqs : Map<string, number>;

    constructor(options : SimpleVocabularyOptions = {}) {
        this._specialTokens = options.specialTokens ? options.specialTokens.slice() : [];
        this._unkToken = options.unkToken !== undefined ? options.unkToken : null;
        if (this._unkToken !== null && !this._specialTokens.includes(this._unkToken))
            this._specialTokens.push(this._unkToken);
        this._minFreq = options.minFreq || 1;
        this._maxTokens = options.maxTokens !== undefined ? options.maxTokens : Infinity;

        this._t2i = new Map;
        this._i2t = [];
        this.freqs = new Map;
        this.reset();
    }

    get size() : number {
        return this._i2t.length;
    }

    has(token : string) : boolean {
        return this._t2i.has(token);
    }

    keys() : string[] {
        return this._i2t.slice();
    }

    reset() : void {
        this._t2i.clear();
        this._i2t = [];
        this.freqs = new Map;
        for (const token of this._specialTokens)
            this._add(token);
    }

    private _add(token : string) : void {
        if (this._t2i.has(token))
            return;
        this._t2i.set(token, this._i2t.length);
        this._i2t.push(token);
    }

    /**
     * Rebuild the vocabulary from the given batches of token sequences.
     *
     * Empty tokens are ignored.
     */
    fit(...batches : Array<Iterable<Iterable<string>>>) : void {
        this.reset();

        const freqs = new Map<string, number>();
        for (const batch of batches) {
            for (const sequence of batch) {
                for (const token of sequence) {
                    if (!token)
                        continue;
                    freqs.set(token, (freqs.get(token) || 0) + 1);
                }
            }
        }
        this.freqs = freqs;

        const sorted = Array.from(freqs.entries());
        // Array.prototype.sort is stable, so equally frequent tokens stay in first-seen order
        sorted.sort((a, b) => b[1] - a[1]);
        for (const [token, freq] of sorted.slice(0, this._maxTokens)) {
            if (this._specialTokens.includes(token))
                continue;
            if (freq >= this._minFreq)
                this._add(token);
        }
        logger.debug(`fitted vocabulary with ${this.size} tokens`);
    }

    private _tokenToIndex(token : string) : number {
        const index = this._t2i.get(token);
        if (index !== undefined)
            return index;
        if (this._unkToken !== null)
            return this._t2i.get(this._unkToken) || 0;
        throw new UnknownTokenError(token);
    }

    private _indexToToken(index : number) : string {
        if (Number.isInteger(index) && index >= 0 && index < this._i2t.length)
            return this._i2t[index];
        if (this._unkToken !== null)
            return this._unkToken;
        throw new UnknownTokenError(index);
    }

    encode(batch : ReadonlyArray<ReadonlyArray<string>>) : number[][] {
        return batch.map((sequence) => sequence.map((token) => this._tokenToIndex(token)));
    }

    decode(batch : ReadonlyArray<ReadonlyArray<number>>) : string[][] {
        return batch.map((sequence) => sequence.map((index) => this._indexToToken(index)));
    }

    /**
     * Look up a batch in either direction: names map to indices, and
     * indices map to names.
     */
    lookup(batch : ReadonlyArray<ReadonlyArray<string>>) : number[][];
    lookup(batch : ReadonlyArray<ReadonlyArray<number>>) : string[][];
    lookup(batch : ReadonlyArray<ReadonlyArray<string|number>>) : Array<Array<string|number>> {
        return batch.map((sequence) => sequence.map((item) => {
            if (typeof item === 'number')
                return this._indexToToken(item);
            else
                return this._tokenToIndex(item);
        }));
    }
}
