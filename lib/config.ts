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

/**
 * The tag of tokens outside of any slot span.
 */
export const OUTSIDE_TAG = 'O';

/**
 * The prefixes a non-outside tag must carry, followed by the slot name.
 */
export const BIO_PREFIXES = ['B-', 'I-'];

/**
 * The prefix that continues an open span.
 */
export const INSIDE_PREFIX = 'I-';

/**
 * The prefix of the placeholder token that replaces a slot mention.
 */
export const DELEXICALIZED_PREFIX = '#';

/**
 * The column of value-index and score matrices reserved for
 * "no value / unknown value".
 */
export const NO_VALUE_INDEX = 0;

/**
 * The score of a slot record that does not carry one.
 */
export const DEFAULT_SCORE = 1;

/**
 * The number of value columns (excluding the two reserved ones) used by
 * the command line tool when none is given.
 */
export const DEFAULT_MAX_NUM_VALUES = 20;

export const DEFAULT_LOG_LEVEL = 'warn';

/**
 * The environment variable consulted by the command line tool when
 * `--log-level` is not given.
 */
export const LOG_LEVEL_ENV = 'SLOTCODEC_LOG_LEVEL';
