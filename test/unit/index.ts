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



process.on('unhandledRejection', (up) => { throw up; });

import testBio from './test_bio';
import testDelexicalizer from './test_delexicalizer';
import testVocabulary from './test_vocabulary';
import testMatrix from './test_matrix';
import testSlotTokenMatrix from './test_slot_token_matrix';
import testSlotValueMatrix from './test_slot_value_matrix';
import testSlotActionMatrix from './test_slot_action_matrix';
import testSlotValueDecoder from './test_slot_value_decoder';
import testParsers from './test_parsers';
import testTurnEncoder from './test_turn_encoder';
import testToolStreams from './test_tool_streams';

const TESTS : Array<[string, () => Promise<void>]> = [
    ['test_bio', testBio],
    ['test_delexicalizer', testDelexicalizer],
    ['test_vocabulary', testVocabulary],
    ['test_matrix', testMatrix],
    ['test_slot_token_matrix', testSlotTokenMatrix],
    ['test_slot_value_matrix', testSlotValueMatrix],
    ['test_slot_action_matrix', testSlotActionMatrix],
    ['test_slot_value_decoder', testSlotValueDecoder],
    ['test_parsers', testParsers],
    ['test_turn_encoder', testTurnEncoder],
    ['test_tool_streams', testToolStreams],
];

async function seq(tests : Array<[string, () => Promise<void>]>) {
    for (const [name, test] of tests) {
        console.log(`Running ${name}`);
        await test();
    }
}

seq(TESTS).then(() => {
    console.log('All tests passed');
}, (e) => {
    console.error(e);
    process.exit(1);
});
