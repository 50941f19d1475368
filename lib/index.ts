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


import * as Config from './config';
import * as Errors from './errors';
import * as StateTracker from './state-tracker';
import * as StreamUtils from './utils/stream-utils';

import { SimpleVocabulary, ActionVocabulary } from './vocab';
import {
    TurnParser,
    DecodeRequestParser,
    JSONLineSerializer,
    parseTurn,
    parseDecodeRequest,
} from './dataset-tools/parsers';
import TurnEncoder, { fitVocabularies } from './dataset-tools/turn_encoder';

export type { Vocabulary, SimpleVocabularyOptions, ActionRecord, ActionLike } from './vocab';
export type { TurnExample, DecodeRequest } from './dataset-tools/parsers';
export type { EncodedTurn, TurnEncoderOptions, FitOptions } from './dataset-tools/turn_encoder';

export {
    Config,
    Errors,
    StateTracker,
    StreamUtils,

    // vocabularies
    SimpleVocabulary,
    ActionVocabulary,

    // datasets
    TurnParser,
    DecodeRequestParser,
    JSONLineSerializer,
    parseTurn,
    parseDecodeRequest,
    TurnEncoder,
    fitVocabularies,
};
