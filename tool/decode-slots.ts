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

import SimpleVocabulary from '../lib/vocab/simple_vocabulary';
import SlotValueMatrixDecoder from '../lib/state-tracker/slot_value_decoder';
import { argmaxRows } from '../lib/state-tracker/matrix';
import { SlotDict } from '../lib/state-tracker/types';
import { DecodeRequest, DecodeRequestParser, JSONLineSerializer } from '../lib/dataset-tools/parsers';
import * as StreamUtils from '../lib/utils/stream-utils';

import { CommonArgs, addCommonArguments, readAllLines } from './lib/argutils';

export interface DecodeSlotsArgs extends CommonArgs {
    slot : string[];
    exclude_value : string[];
}

export interface DecodedTurn {
    id : string;
    slots : SlotDict;
}

export class SlotDecoderStream extends Stream.Transform {
    private _decoder : SlotValueMatrixDecoder;

    constructor(decoder : SlotValueMatrixDecoder) {
        super({ objectMode: true });

        this._decoder = decoder;
    }

    private _decode(request : DecodeRequest) : DecodedTurn {
        const values = request.values !== undefined ? request.values : argmaxRows(request.scores || []);
        const [slots] = this._decoder.decode(values, [request.candidates]);
        return { id: request.id, slots };
    }

    _transform(request : DecodeRequest, encoding : BufferEncoding, callback : (error ?: Error|null, result ?: DecodedTurn) => void) {
        let decoded;
        try {
            decoded = this._decode(request);
        } catch(e) {
            callback(e instanceof Error ? e : new Error(String(e)));
            return;
        }
        callback(null, decoded);
    }

    _flush(callback : () => void) {
        process.nextTick(callback);
    }
}

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('decode-slots', {
        add_help: true,
        description: "Convert per-slot value indices (or value scores) back into slot values."
    });
    addCommonArguments(parser);
    parser.add_argument('--slot', {
        required: true,
        nargs: '+',
        help: "The slots, in the order of the rows of the model output."
    });
    parser.add_argument('--exclude-value', {
        required: false,
        nargs: '*',
        default: [],
        help: "Values to leave out of the decoded slots (e.g. none, dontcare)."
    });
}

export async function execute(args : DecodeSlotsArgs) {
    const slotVocab = new SimpleVocabulary();
    slotVocab.fit([args.slot]);
    const decoder = new SlotValueMatrixDecoder(slotVocab, args.exclude_value);

    readAllLines(args.input_file)
        .pipe(new DecodeRequestParser())
        .pipe(new SlotDecoderStream(decoder))
        .pipe(new JSONLineSerializer())
        .pipe(args.output);

    await StreamUtils.waitFinish(args.output);
}
