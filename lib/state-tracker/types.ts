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
 * The legal surface values of each slot in one dialogue turn.
 */
export type CandidateSet = Readonly<Record<string, readonly string[]>>;

/**
 * A candidate set wrapped in a batch.
 *
 * Upstream components always wrap the candidates of the current turn in
 * a batch of exactly one element; a `null` element requests presence
 * masks instead of value indices (where that is supported).
 */
export type CandidateBatch = ReadonlyArray<CandidateSet|null>;

/**
 * A contiguous run of tokens tagged with the same slot.
 */
export interface SlotSpan {
    slot : string;
    start : number;
    length : number;
}

export interface SlotRecord {
    slot : string;
    value : string;
    score ?: number;
}

/**
 * A mapping from slot name to the chosen value of that slot.
 */
export type SlotDict = Record<string, string>;

/**
 * The slots of one utterance, either as a slot dict or as a list of
 * (optionally scored) slot records.
 */
export type SlotsInput = Readonly<SlotDict>|ReadonlyArray<SlotRecord>;

/**
 * A dense row-major 2-D array.
 */
export type Matrix = number[][];
