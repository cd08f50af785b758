/**
 * Scout output. Scores are min-max normalized into [0, 1]; fusionScore is
 * always derived from the other two.
 */
export class Candidate {
    constructor(
        public readonly chunkId: string,
        public readonly sourceNoteId: string,
        public readonly lexicalScore: number,
        public readonly denseScore: number,
        public readonly fusionScore: number
    ) {}
}
