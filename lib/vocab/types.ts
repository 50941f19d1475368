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


/**
 * A closed bijection between symbolic names and dense integer indices.
 *
 * Lookups are batched: a batch is a sequence of sequences, and the result
 * has the same shape (implementations are free to flatten, see
 * {@link ActionVocabulary}).
 */
export interface Vocabulary<T = string> {
    readonly size : number;

    has(token : string) : boolean;
    encode(batch : ReadonlyArray<ReadonlyArray<T>>) : number[][];
    decode(batch : ReadonlyArray<ReadonlyArray<number>>) : string[][];
}
