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


import * as Stream from 'stream';
import byline from 'byline';

type WriteCallback = (err ?: Error) => void;

/**
 * Collect every object written to the stream into an array.
 */
class ArrayAccumulator<T> extends Stream.Writable implements Stream.Writable {
    private _buffer : T[];

    constructor() {
        super({ objectMode: true });

        this._buffer = [];
    }

    _write(obj : T, encoding : BufferEncoding, callback : WriteCallback) : void {
        this._buffer.push(obj);
        callback();
    }

    read() : Promise<T[]> {
        return new Promise((resolve, reject) => {
            this.on('finish', () => resolve(this._buffer));
            this.on('error', reject);
        });
    }
}

function fromArray<T>(array : readonly T[]) : Stream.Readable {
    return Stream.Readable.from(array);
}

async function* iterateLines(streams : Stream.Readable[]) : AsyncGenerator<string, void> {
    for (const stream of streams) {
        for await (const line of stream.setEncoding('utf8').pipe(byline()))
            yield String(line);
    }
}

/**
 * Read the lines of each stream in turn, as one object stream.
 */
function lines(streams : Stream.Readable[]) : Stream.Readable {
    return Stream.Readable.from(iterateLines(streams));
}

export {
    ArrayAccumulator,
    fromArray,
    lines,
};

export function waitFinish(stream : NodeJS.WritableStream) : Promise<void> {
    return new Promise((resolve, reject) => {
        stream.once('finish', resolve);
        stream.on('error', reject);
    });
}
