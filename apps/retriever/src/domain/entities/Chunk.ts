export class Chunk {
    constructor(
        public readonly id: string,
        public readonly sourceNoteId: string,
        public readonly text: string,
        public readonly offset: number
    ) {}
}
