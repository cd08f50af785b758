export interface ResultPointer {
    readonly sourceNoteId: string;
    readonly offset: number;
}

export class FinalResult {
    constructor(
        public readonly chunkId: string,
        public readonly calibratedScore: number,
        public readonly rawScore: number,
        public readonly patientUid: string | null,
        public readonly pointer: ResultPointer
    ) {}
}
