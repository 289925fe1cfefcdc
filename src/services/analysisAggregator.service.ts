// src/services/analysisAggregator.service.ts
import 'reflect-metadata';
import { singleton } from 'tsyringe';
import { AnalysisFailedError, AnalysisFailureKind, EmptyInputError } from '../errors/analysis.errors';
import { SegmentFailure, SegmentFailureReason, SegmentOutcome } from '../types/logAnalysis.types';

const REASON_LABELS: Record<SegmentFailureReason, string> = {
    backend: 'backend error',
    rate_limited: 'rate limit exceeded',
    cancelled: 'cancelled',
};

export const SEGMENT_SEPARATOR = '\n\n';

/** Offsets refer to the preprocessed text that was chunked, not the uploaded file. */
export const formatGapMarker = (failure: SegmentFailure): string =>
    `[Segment ${failure.index + 1} (chars ${failure.start}-${failure.end} of the analyzed text) not analyzed: ${REASON_LABELS[failure.reason]}]`;

/**
 * Folds per-segment outcomes into one report, always in document order.
 */
@singleton()
export class AnalysisAggregatorService {
    /**
     * @throws AnalysisFailedError when no segment succeeded
     */
    public aggregate(outcomes: readonly SegmentOutcome[]): string {
        if (outcomes.length === 0) {
            throw new EmptyInputError('No segments to aggregate');
        }
        const ordered = [...outcomes].sort((a, b) => a.segment.index - b.segment.index);

        const failures: SegmentFailure[] = [];
        const sections = ordered.map(outcome => {
            if (outcome.status === 'fulfilled') {
                return outcome.result.analysis;
            }
            failures.push(outcome.failure);
            return formatGapMarker(outcome.failure);
        });

        if (failures.length === ordered.length) {
            throw new AnalysisFailedError(this.classifyTotalFailure(failures), failures);
        }
        if (failures.length > 0) {
            sections.push(this.formatGapSummary(failures, ordered.length));
        }
        return sections.join(SEGMENT_SEPARATOR);
    }

    private formatGapSummary(failures: SegmentFailure[], total: number): string {
        const lines = failures.map(failure =>
            `- Segment ${failure.index + 1}, chars ${failure.start}-${failure.end}: ${REASON_LABELS[failure.reason]} (${failure.message})`);
        return [`Unanalyzed regions (${failures.length} of ${total} segments; offsets are into the analyzed text):`, ...lines].join('\n');
    }

    private classifyTotalFailure(failures: SegmentFailure[]): AnalysisFailureKind {
        if (failures.every(failure => failure.reason === 'cancelled')) {
            return 'cancelled';
        }
        if (failures.every(failure => failure.reason !== 'backend')) {
            return 'rate_limited';
        }
        return 'backend_unavailable';
    }
}
