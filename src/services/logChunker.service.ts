// src/services/logChunker.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { ConfigService } from '../config/config.service';
import { ChunkingOptions } from '../config/types';
import { EmptyInputError } from '../errors/analysis.errors';
import { Segment } from '../types/logAnalysis.types';

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

/** True when a cut at `offset` would separate the two halves of an astral character. */
const splitsSurrogatePair = (text: string, offset: number): boolean =>
    offset > 0
    && offset < text.length
    && isHighSurrogate(text.charCodeAt(offset - 1))
    && isLowSurrogate(text.charCodeAt(offset));

/**
 * Splits document text into fixed-size segments where each segment repeats the last
 * `chunkOverlap` characters of its predecessor, so an error straddling a boundary
 * is seen whole by at least one segment.
 *
 * Sizes and offsets count UTF-16 code units. A boundary never falls inside a surrogate pair:
 * the end moves back one unit and the overlap start forward one. With `chunkSize` 1 the end
 * moves forward instead, so that segment holds the whole pair.
 */
@singleton()
export class LogChunkerService {
    private readonly defaults: ChunkingOptions;

    constructor(@inject(ConfigService) configService: ConfigService) {
        this.defaults = configService.chunking;
    }

    public split(text: string, options: Partial<ChunkingOptions> = {}): Segment[] {
        const chunkSize = options.chunkSize ?? this.defaults.chunkSize;
        const chunkOverlap = options.chunkOverlap ?? this.defaults.chunkOverlap;

        if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
            throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
        }
        if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
            throw new RangeError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`);
        }
        if (text.length === 0) {
            throw new EmptyInputError();
        }

        const segments: Segment[] = [];
        let start = 0;
        for (;;) {
            let end = Math.min(start + chunkSize, text.length);
            if (splitsSurrogatePair(text, end)) {
                // A one-unit segment cannot shrink, so it takes the whole pair instead.
                end += end - 1 > start ? -1 : 1;
            }
            segments.push({ index: segments.length, text: text.slice(start, end), start, end });
            if (end === text.length) {
                return segments;
            }
            let next = end - chunkOverlap;
            if (splitsSurrogatePair(text, next)) {
                next += 1;
            }
            start = next > start ? next : end;
        }
    }

    /**
     * Inverse of `split`: drops each segment's leading overlap and concatenates.
     */
    public static reassemble(segments: readonly Segment[]): string {
        let text = '';
        let covered = 0;
        for (const segment of segments) {
            text += segment.text.slice(covered - segment.start);
            covered = segment.end;
        }
        return text;
    }
}
