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


import Stream from 'stream';

import { DatasetFormatError } from '../errors';
import { ActionRecord } from '../vocab/action_vocabulary';
import { CandidateSet, SlotRecord, SlotsInput } from '../state-tracker/types';

/**
 * One turn of a tagged dialogue dataset.
 */
export interface TurnExample {
    id : string;
    tokens : string[];
    tags : string[];
    candidates ?: CandidateSet;
    slots ?: SlotsInput;
    actions ?: ActionRecord[];
}

/**
 * The model output for one turn, to be converted back to slots.
 *
 * Exactly one of `values` (the per-slot value indices) and `scores`
 * (the per-slot value score matrix) is present.
 */
export interface DecodeRequest {
    id : string;
    values ?: number[];
    scores ?: number[][];
    candidates : CandidateSet;
}

type JSONObject = { [key : string] : unknown };

function isObject(value : unknown) : value is JSONObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value : unknown) : value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNumberArray(value : unknown) : value is number[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

class RecordValidator {
    private _line : number;

    constructor(line : number) {
        this._line = line;
    }

    fail(message : string) : never {
        throw new DatasetFormatError(this._line, message);
    }

    parse(line : string) : JSONObject {
        let parsed : unknown;
        try {
            parsed = JSON.parse(line);
        } catch(e) {
            this.fail(e instanceof Error ? e.message : String(e));
        }
        if (!isObject(parsed))
            this.fail('expected a JSON object');
        return parsed;
    }

    id(record : JSONObject) : string {
        const id = record.id;
        if (id === undefined)
            return String(this._line);
        if (typeof id !== 'string' && typeof id !== 'number')
            this.fail('id must be a string or a number');
        return String(id);
    }

    // sequences can be given as arrays or as space-separated strings
    sequence(record : JSONObject, key : string) : string[] {
        const value = record[key];
        if (typeof value === 'string') {
            const trimmed = value.trim();
            return trimmed ? trimmed.split(/\s+/) : [];
        }
        if (!isStringArray(value))
            this.fail(`${key} must be a string or an array of strings`);
        return value;
    }

    candidates(value : unknown) : CandidateSet {
        if (!isObject(value))
            this.fail('candidates must be an object');
        // fromEntries defines own properties, so a slot named __proto__ stays a slot
        return Object.fromEntries(Object.keys(value).map((slot) : [string, string[]] => {
            const slotCandidates = value[slot];
            if (!isStringArray(slotCandidates))
                this.fail(`candidates of slot '${slot}' must be an array of strings`);
            return [slot, slotCandidates];
        }));
    }

    private _slotRecord(value : unknown) : SlotRecord {
        if (!isObject(value))
            this.fail('slot records must be objects');
        const { slot, value: slotValue, score } = value;
        if (typeof slot !== 'string' || typeof slotValue !== 'string')
            this.fail('slot records must have a string slot and a string value');
        const record : SlotRecord = { slot, value: slotValue };
        if (score !== undefined) {
            if (typeof score !== 'number')
                this.fail(`score of slot '${slot}' must be a number`);
            record.score = score;
        }
        return record;
    }

    slots(value : unknown) : SlotsInput {
        if (Array.isArray(value))
            return value.map((item : unknown) => this._slotRecord(item));
        if (!isObject(value))
            this.fail('slots must be an object or an array of slot records');
        return Object.fromEntries(Object.keys(value).map((slot) : [string, string] => {
            const slotValue = value[slot];
            if (typeof slotValue !== 'string')
                this.fail(`value of slot '${slot}' must be a string`);
            return [slot, slotValue];
        }));
    }

    actions(value : unknown) : ActionRecord[] {
        if (!Array.isArray(value))
            this.fail('actions must be an array');
        return value.map((item : unknown) => {
            if (!isObject(item))
                this.fail('actions must be objects');
            const { act, slots } = item;
            if (typeof act !== 'string')
                this.fail('actions must have a string act');
            const action : ActionRecord = { act };
            if (slots !== undefined) {
                if (!isStringArray(slots))
                    this.fail(`slots of action '${act}' must be an array of strings`);
                action.slots = slots;
            }
            return action;
        });
    }
}

/**
 * Parse one line of a turn dataset, or return `null` for a blank line.
 */
export function parseTurn(line : string, lineNumber : number) : TurnExample|null {
    if (!line.trim())
        return null;

    const validator = new RecordValidator(lineNumber);
    const record = validator.parse(line);

    const turn : TurnExample = {
        id: validator.id(record),
        tokens: validator.sequence(record, 'tokens'),
        tags: validator.sequence(record, 'tags'),
    };
    if (turn.tokens.length !== turn.tags.length)
        validator.fail(`${turn.tokens.length} tokens but ${turn.tags.length} tags`);
    if (record.candidates !== undefined)
        turn.candidates = validator.candidates(record.candidates);
    if (record.slots !== undefined)
        turn.slots = validator.slots(record.slots);
    if (record.actions !== undefined)
        turn.actions = validator.actions(record.actions);
    return turn;
}

/**
 * Parse one line of model output, or return `null` for a blank line.
 */
export function parseDecodeRequest(line : string, lineNumber : number) : DecodeRequest|null {
    if (!line.trim())
        return null;

    const validator : RecordValidator = new RecordValidator(lineNumber);
    const record = validator.parse(line);

    const request : DecodeRequest = {
        id: validator.id(record),
        candidates: validator.candidates(record.candidates),
    };
    const { values, scores } = record;
    if (values !== undefined) {
        if (!isNumberArray(values))
            validator.fail('values must be an array of numbers');
        request.values = values;
    } else if (scores !== undefined) {
        if (!Array.isArray(scores) || !scores.every(isNumberArray))
            validator.fail('scores must be an array of arrays of numbers');
        request.scores = scores;
    } else {
        validator.fail('expected one of values or scores');
    }
    return request;
}

export type LineParser<T> = (line : string, lineNumber : number) => T|null;

export class JSONLineParser<T> extends Stream.Transform {
    private _n : number;
    private _parse : LineParser<T>;

    constructor(parse : LineParser<T>) {
        super({
            readableObjectMode: true,
            writableObjectMode: true,
        });
        this._n = 0;
        this._parse = parse;
    }

    _transform(line : string|Buffer, encoding : BufferEncoding, callback : (err ?: Error|null, res ?: T) => void) {
        this._n ++;
        let parsed : T|null;
        try {
            parsed = this._parse(String(line), this._n);
        } catch(e) {
            callback(e instanceof Error ? e : new Error(String(e)));
            return;
        }
        if (parsed === null)
            callback();
        else
            callback(null, parsed);
    }

    _flush(callback : (err : Error|null) => void) {
        process.nextTick(callback);
    }
}

/**
 * Parse a stream of lines into {@link TurnExample} objects.
 */
export class TurnParser extends JSONLineParser<TurnExample> {
    constructor() {
        super(parseTurn);
    }
}

export class DecodeRequestParser extends JSONLineParser<DecodeRequest> {
    constructor() {
        super(parseDecodeRequest);
    }
}

/**
 * Write each object as one line of JSON.
 */
export class JSONLineSerializer extends Stream.Transform {
    constructor() {
        super({
            writableObjectMode: true,
        });
    }

    _transform(obj : unknown, encoding : BufferEncoding, callback : (err ?: Error|null, buffer ?: string) => void) {
        callback(null, JSON.stringify(obj) + '\n');
    }

    _flush(callback : (err : Error|null) => void) {
        process.nextTick(callback);
    }
}
