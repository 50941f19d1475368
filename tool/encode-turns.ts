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
import { getLogger } from 'log4js';

import { DEFAULT_MAX_NUM_VALUES } from '../lib/config';
import TurnEncoder, { EncodedTurn, fitVocabularies } from '../lib/dataset-tools/turn_encoder';
import { JSONLineSerializer, TurnExample, TurnParser } from '../lib/dataset-tools/parsers';
import * as StreamUtils from '../lib/utils/stream-utils';

import { CommonArgs, addCommonArguments, readAllLines } from './lib/argutils';

const logger = getLogger('slotcodec.encode-turns');

export interface EncodeTurnsArgs extends CommonArgs {
    max_num_values : number;
    mask : boolean;
    slot : string[]|undefined;
}

export class TurnEncoderStream extends Stream.Transform {
    private _encoder : TurnEncoder;

    constructor(encoder : TurnEncoder) {
        super({ objectMode: true });

        this._encoder = encoder;
    }

    _transform(turn : TurnExample, encoding : BufferEncoding, callback : (error ?: Error|null, result ?: EncodedTurn) => void) {
        let encoded;
        try {
            encoded = this._encoder.encode(turn);
        } catch(e) {
            callback(e instanceof Error ? e : new Error(String(e)));
            return;
        }
        callback(null, encoded);
    }

    _flush(callback : () => void) {
        process.nextTick(callback);
    }
}

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('encode-turns', {
        add_help: true,
        description: "Encode a tagged dataset into slot matrices."
    });
    addCommonArguments(parser);
    parser.add_argument('--max-num-values', {
        required: false,
        type: Number,
        default: DEFAULT_MAX_NUM_VALUES,
        help: `The number of value columns of slot value matrices, excluding the two reserved ones (defaults to ${DEFAULT_MAX_NUM_VALUES}).`
    });
    parser.add_argument('--mask', {
        required: false,
        action: 'store_true',
        default: false,
        help: "Build slot presence masks instead of value indices, even for turns with candidates."
    });
    parser.add_argument('--slot', {
        required: false,
        nargs: '+',
        help: "The slots to encode, in order (defaults to all slots found in the dataset)."
    });
}

export async function execute(args : EncodeTurnsArgs) {
    const turns = await readAllLines(args.input_file)
        .pipe(new TurnParser())
        .pipe(new StreamUtils.ArrayAccumulator<TurnExample>())
        .read();

    const { slotVocab, actionVocab } = fitVocabularies(turns, { slots: args.slot });
    logger.info(`Encoding ${turns.length} turns with ${slotVocab.size} slots and ${actionVocab.size} actions`);
    logger.info(`Actions: ${actionVocab.keys().join(', ')}`);

    const encoder = new TurnEncoder({
        slotVocab,
        actionVocab,
        maxNumValues: args.max_num_values,
        mask: args.mask,
    });

    StreamUtils.fromArray(turns)
        .pipe(new TurnEncoderStream(encoder))
        .pipe(new JSONLineSerializer())
        .pipe(args.output);

    await StreamUtils.waitFinish(args.output);
}
