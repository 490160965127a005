export type LookupOutcome = 'found' | 'not_found' | 'invalid_input' | 'error';
