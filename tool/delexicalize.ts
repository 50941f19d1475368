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


import * as argparse from 'argparse';
import * as Stream from 'stream';

import Delexicalizer from '../lib/state-tracker/delexicalizer';
import { TurnExample, TurnParser } from '../lib/dataset-tools/parsers';
import * as StreamUtils from '../lib/utils/stream-utils';

import { CommonArgs, addCommonArguments, readAllLines } from './lib/argutils';

export class DelexicalizeStream extends Stream.Transform {
    private _delexicalizer : Delexicalizer;

    constructor() {
        super({ writableObjectMode: true });

        this._delexicalizer = new Delexicalizer();
    }

    _transform(turn : TurnExample, encoding : BufferEncoding, callback : (error ?: Error|null, result ?: string) => void) {
        let delexicalized;
        try {
            delexicalized = this._delexicalizer.delexicalize([turn.tokens], [turn.tags])[0];
        } catch(e) {
            callback(e instanceof Error ? e : new Error(String(e)));
            return;
        }
        callback(null, turn.id + '\t' + delexicalized.join(' ') + '\n');
    }

    _flush(callback : () => void) {
        process.nextTick(callback);
    }
}

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('delexicalize', {
        add_help: true,
        description: "Replace the slot mentions of a tagged dataset with #slot placeholders."
    });
    addCommonArguments(parser);
}

export async function execute(args : CommonArgs) {
    readAllLines(args.input_file)
        .pipe(new TurnParser())
        .pipe(new DelexicalizeStream())
        .pipe(args.output);

    await StreamUtils.waitFinish(args.output);
}
