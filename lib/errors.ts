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
 * Base class of all errors raised by the codec.
 *
 * Every error carries a short machine-readable `code`, so callers can
 * dispatch on it without string matching the message.
 */
export class CodecError extends Error {
    code : string;

    constructor(code : string, message : string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * A tag that is neither `O` nor prefixed with `B-` or `I-`.
 */
export class FormatError extends CodecError {
    tag : string;

    constructor(tag : string) {
        super('EBADTAG', `Wrong tag format: ${tag}`);
        this.tag = tag;
    }
}

export class UnknownSlotError extends CodecError {
    slot : string;

    constructor(slot : string) {
        super('EUNKSLOT', `Utterance slot '${slot}' doesn't match any slot from slot vocabulary`);
        this.slot = slot;
    }
}

export class UnknownActionError extends CodecError {
    action : string;

    constructor(action : string) {
        super('EUNKACT', `Action '${action}' doesn't match any action from action vocabulary`);
        this.action = action;
    }
}

export class UnknownTokenError extends CodecError {
    token : string|number;

    constructor(token : string|number) {
        super('EUNKTOKEN', typeof token === 'number' ?
            `Index ${token} is out of the vocabulary range` :
            `Token '${token}' is not in the vocabulary`);
        this.token = token;
    }
}

/**
 * A slot, or a slot value, observed in the data is missing from the
 * candidate set of the turn.
 */
export class CandidateMismatchError extends CodecError {
    slot : string;
    value : string|null;

    constructor(slot : string, value : string|null = null) {
        super('ECANDIDATE', value === null ?
            `slot '${slot}' is not in candidates` :
            `value '${value}' of slot '${slot}' is not in candidates`);
        this.slot = slot;
        this.value = value;
    }
}

export class UnsupportedBatchShapeError extends CodecError {
    length : number;

    constructor(length : number) {
        super('EBATCH', `not implemented for candidates with length ${length} (expected exactly 1)`);
        this.length = length;
    }
}

export class ShapeMismatchError extends CodecError {
    constructor(message : string) {
        super('ESHAPE', message);
    }
}

export class DatasetFormatError extends CodecError {
    line : number;

    constructor(line : number, message : string) {
        super('EDATASET', `malformed record on line ${line}: ${message}`);
        this.line = line;
    }
}
