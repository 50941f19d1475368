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


import SimpleVocabulary from './simple_vocabulary';
import ActionVocabulary from './action_vocabulary';

export type { SimpleVocabularyOptions } from './simple_vocabulary';
export type { ActionRecord, ActionLike } from './action_vocabulary';
export type { Vocabulary } from './types';

export {
    SimpleVocabulary,
    ActionVocabulary,
};
