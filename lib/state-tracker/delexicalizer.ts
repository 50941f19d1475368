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


import { DELEXICALIZED_PREFIX } from '../config';
import { checkParallel, tagToSlot } from './bio';

/**
 * Replace every token that belongs to a slot with `#<slot>`.
 */
export default class Delexicalizer {
    delexicalize(utterances : ReadonlyArray<readonly string[]>,
                 tags : ReadonlyArray<readonly string[]>) : string[][] {
        checkParallel(utterances, tags);

        return utterances.map((words, i) => words.map((word, j) => {
            const slot = tagToSlot(tags[i][j]);
            if (slot === null)
                return word;
            return DELEXICALIZED_PREFIX + slot;
        }));
    }
}
