export interface LineAndCharacter {
    /** 0-based */
    line: number;
    /** 0-based */
    character: number;
}

export function computeLineStarts(text: string): number[] {
    const result = [0];
    for (let i = 0; i < text.length; ++i) {
        const ch = text.charCodeAt(i);
        if (ch === 13 /* \r */) {
            if (text.charCodeAt(i + 1) === 10 /* \n */)
                ++i;
            result.push(i + 1);
        } else if (ch === 10 /* \n */) {
            result.push(i + 1);
        }
    }
    return result;
}

export function getLineAndCharacterOfPosition(lineStarts: readonly number[], pos: number): LineAndCharacter {
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
        const middle = (low + high + 1) >> 1;
        if (lineStarts[middle] <= pos) {
            low = middle;
        } else {
            high = middle - 1;
        }
    }
    return {line: low, character: pos - lineStarts[low]};
}

export interface SourceSpan {
    pos: number;
    end: number;
    startPosition: LineAndCharacter;
    endPosition: LineAndCharacter;
}

export function createSourceSpan(lineStarts: readonly number[], pos: number, end: number): SourceSpan {
    return {
        pos,
        end,
        startPosition: getLineAndCharacterOfPosition(lineStarts, pos),
        endPosition: getLineAndCharacterOfPosition(lineStarts, end),
    };
}
