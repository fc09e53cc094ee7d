/**
 * Recursive character text splitter.
 *
 * Splits on the coarsest separator present, merges the pieces back up to
 * `chunkSize` with `chunkOverlap` characters carried between neighbours, and
 * recurses with finer separators into pieces that are still too large.
 *
 * Dependency direction: chunker.ts → nothing (leaf module)
 * Used by: knowledge base
 */

export interface ChunkOptions {
    chunkSize: number;
    chunkOverlap: number;
    separators?: readonly string[];
}

export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ' ', ''];

function splitOn(text: string, separator: string): string[] {
    const pieces = separator ? text.split(separator) : Array.from(text);
    return pieces.filter((piece) => piece !== '');
}

function mergeSplits(splits: readonly string[], separator: string, opts: ChunkOptions): string[] {
    const chunks: string[] = [];
    const current: string[] = [];
    let total = 0;

    const flush = (): void => {
        const chunk = current.join(separator).trim();
        if (chunk) chunks.push(chunk);
    };

    for (const piece of splits) {
        const joinCost = current.length > 0 ? separator.length : 0;

        if (total + piece.length + joinCost > opts.chunkSize && current.length > 0) {
            flush();
            // Drop from the front until what is left fits as overlap.
            while (
                total > opts.chunkOverlap ||
                (total > 0 && total + piece.length + (current.length > 0 ? separator.length : 0) > opts.chunkSize)
            ) {
                const first = current.shift();
                if (first === undefined) break;
                total -= first.length + (current.length > 0 ? separator.length : 0);
            }
        }

        current.push(piece);
        total += piece.length + (current.length > 1 ? separator.length : 0);
    }

    flush();
    return chunks;
}

function splitRecursive(text: string, separators: readonly string[], opts: ChunkOptions): string[] {
    let index = separators.findIndex((sep) => sep === '' || text.includes(sep));
    if (index === -1) index = separators.length - 1;

    const separator = separators[index] ?? '';
    const finer = separators.slice(index + 1);

    const chunks: string[] = [];
    let small: string[] = [];

    for (const piece of splitOn(text, separator)) {
        if (piece.length < opts.chunkSize) {
            small.push(piece);
            continue;
        }
        if (small.length > 0) {
            chunks.push(...mergeSplits(small, separator, opts));
            small = [];
        }
        if (finer.length === 0) {
            chunks.push(piece);
        } else {
            chunks.push(...splitRecursive(piece, finer, opts));
        }
    }

    if (small.length > 0) {
        chunks.push(...mergeSplits(small, separator, opts));
    }
    return chunks;
}

/**
 * Split text into chunks of at most `chunkSize` characters where the
 * separators allow it.
 */
export function splitText(text: string, opts: ChunkOptions): string[] {
    if (!text.trim()) return [];
    return splitRecursive(text, opts.separators ?? DEFAULT_SEPARATORS, opts);
}
