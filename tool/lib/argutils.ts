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


import * as fs from 'fs';
import * as stream from 'stream';
import * as argparse from 'argparse';

import * as StreamUtils from '../../lib/utils/stream-utils';

export function maybeCreateReadStream(filename : string) : stream.Readable {
    if (filename === '-')
        return process.stdin;
    else
        return fs.createReadStream(filename);
}

export function readAllLines(files : stream.Readable[]) : stream.Readable {
    return StreamUtils.lines(files);
}

/**
 * The arguments shared by every subcommand.
 */
export interface CommonArgs {
    subcommand : string;
    log_level : string|undefined;
    output : stream.Writable;
    input_file : stream.Readable[];
}

export function addCommonArguments(parser : argparse.ArgumentParser) : void {
    parser.add_argument('-o', '--output', {
        required: false,
        default: process.stdout,
        type: fs.createWriteStream,
        help: "Write results to this file instead of stdout"
    });
    parser.add_argument('input_file', {
        nargs: '+',
        type: maybeCreateReadStream,
        help: 'Input datasets (in JSON lines format); use - for standard input'
    });
}
