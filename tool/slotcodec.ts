#!/usr/bin/env node
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


process.on('unhandledRejection', (up) => {
    throw up;
});

import * as argparse from 'argparse';

import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV } from '../lib/config';
import { CommonArgs } from './lib/argutils';
import { configureLogging } from './lib/logging';

import * as Delexicalize from './delexicalize';
import * as EncodeTurns from './encode-turns';
import * as DecodeSlots from './decode-slots';

interface SubCommand {
    initArgparse(parser : argparse.SubParser) : void;
    execute(args : CommonArgs) : Promise<void>;
}

const subcommands : { [key : string] : SubCommand } = {
    'delexicalize': Delexicalize,
    'encode-turns': EncodeTurns,
    'decode-slots': DecodeSlots,
};

async function main() {
    const parser = new argparse.ArgumentParser({
        add_help: true,
        description: "Convert BIO-tagged dialogue turns to slot matrices, and model outputs back to slot values."
    });
    parser.add_argument('--log-level', {
        required: false,
        choices: ['trace', 'debug', 'info', 'warn', 'error', 'off'],
        help: `Verbosity of the logs written to standard error (defaults to $${LOG_LEVEL_ENV}, or ${DEFAULT_LOG_LEVEL}).`
    });

    const subparsers = parser.add_subparsers({
        title: 'Available sub-commands',
        dest: 'subcommand',
        required: true
    } as argparse.SubparserOptions);
    for (const subcommand in subcommands)
        subcommands[subcommand].initArgparse(subparsers);

    const args = parser.parse_args();
    configureLogging(args.log_level);
    await subcommands[args.subcommand].execute(args);
}
main();
