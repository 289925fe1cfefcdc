// src/types/logAnalysis.types.ts

export type LogFormatHint = 'json' | 'access' | 'syslog' | 'structured' | 'unstructured';
export type LogComplexity = 'simple' | 'moderate' | 'complex';
export type PromptVariant = 'standard' | 'quick' | 'detailed';
export type LogSeverity = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export interface LogDocument {
    readonly text: string;
    readonly byteLength: number;
    readonly formatHint: LogFormatHint;
}

export interface Segment {
    readonly index: number;
    readonly text: string;
    /** Inclusive start offset in the document, in UTF-16 code units. */
    readonly start: number;
    /** Exclusive end offset. */
    readonly end: number;
}

export interface AnalysisResult {
    index: number;
    analysis: string;
    fromCache: boolean;
}

export type SegmentFailureReason = 'backend' | 'rate_limited' | 'cancelled';

export interface SegmentFailure {
    index: number;
    start: number;
    end: number;
    reason: SegmentFailureReason;
    message: string;
    retryAfterMs?: number;
}

export type SegmentOutcome =
    | { status: 'fulfilled'; segment: Segment; result: AnalysisResult }
    | { status: 'failed'; segment: Segment; failure: SegmentFailure };

export interface DispatchTotals {
    invocations: number;
    cacheHits: number;
    collapsed: number;
    tokensIn: number;
    tokensOut: number;
    costUsd: number;
}

export interface DispatchResult {
    /** One entry per input segment, in segment order. */
    outcomes: SegmentOutcome[];
    totals: DispatchTotals;
}

export interface AnalysisReport {
    requestId: string;
    report: string;
    formatHint: LogFormatHint;
    complexity: LogComplexity;
    promptVariant: PromptVariant;
    segmentCount: number;
    failedSegments: number;
    cachedSegments: number;
    invocations: number;
    tokensIn: number;
    tokensOut: number;
    costUsd: number;
    durationMs: number;
}
