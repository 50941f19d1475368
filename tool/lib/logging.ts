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


import * as log4js from 'log4js';

import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV } from '../../lib/config';

/**
 * Send all library logs to standard error, so they do not mix with the
 * output of the tool.
 */
export function configureLogging(level : string|undefined) : void {
    log4js.configure({
        appenders: {
            stderr: { type: 'stderr' },
        },
        categories: {
            default: { appenders: ['stderr'], level: level || process.env[LOG_LEVEL_ENV] || DEFAULT_LOG_LEVEL },
        },
    });
}
