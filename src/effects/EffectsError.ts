/**
 * Raised by the checkout shell when one or more row sources could not be
 * read. Every failure is kept so the caller can report all of them at once.
 */
export class EffectsError extends Error {
    constructor(readonly failures: Error[]) {
        super(`Failed to load checkout data: ${failures.map(e => e.message).join('; ')}`);
        this.name = 'EffectsError';
    }
}
