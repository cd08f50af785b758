export class NoteLinkTable {
    private readonly patientByNote = new Map<string, string>();

    constructor(links: Iterable<{ noteUid: string; patientUid: string }> = []) {
        for (const link of links) {
            if (!this.patientByNote.has(link.noteUid)) {
                this.patientByNote.set(link.noteUid, link.patientUid);
            }
        }
    }

    get size(): number {
        return this.patientByNote.size;
    }

    // Unknown notes resolve to null: the patient is simply not known.
    patientFor(noteUid: string): string | null {
        return this.patientByNote.get(noteUid) ?? null;
    }
}
