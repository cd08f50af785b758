export interface EvidenceSpan {
    readonly token: string;
    readonly weight: number;
    readonly position: number;
}

/** Evidence order: weight descending, then position ascending. */
export function compareEvidence(a: EvidenceSpan, b: EvidenceSpan): number {
    return b.weight - a.weight || a.position - b.position;
}

export class RescoredCandidate {
    constructor(
        public readonly chunkId: string,
        public readonly sourceNoteId: string,
        public readonly interactionScore: number,
        public readonly fusionScore: number,
        public readonly evidence?: readonly EvidenceSpan[]
    ) {}
}
