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


import { Matrix } from './types';

export function zeros(rows : number, columns : number) : Matrix {
    const matrix : Matrix = [];
    for (let i = 0; i < rows; i++)
        matrix.push(new Array<number>(columns).fill(0));
    return matrix;
}

export function shape(matrix : ReadonlyArray<readonly number[]>) : [number, number] {
    return [matrix.length, matrix.length > 0 ? matrix[0].length : 0];
}

/**
 * Compute the column of the highest score of each row.
 *
 * Ties resolve to the lowest column; an empty row maps to column 0.
 */
export function argmaxRows(matrix : ReadonlyArray<readonly number[]>) : number[] {
    return matrix.map((row) => {
        let best = 0;
        for (let j = 1; j < row.length; j++) {
            if (row[j] > row[best])
                best = j;
        }
        return best;
    });
}
