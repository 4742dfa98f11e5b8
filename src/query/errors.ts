/** Rejected before any retrieval or persistence takes place. */
export class InvalidQueryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "InvalidQueryError";
    }
}
