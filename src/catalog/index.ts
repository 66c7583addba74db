import fs from 'fs';
import { PostalRange, WeightBracket } from '../domain/models';
import { ValidationError } from '../domain/errors';
import { validateCatalog } from '../domain/schemas';
import brazilCatalog from './brazil.json';

/** Zero-pads an integer CEP back to its 8-digit form: 1000000 -> "01000000". */
export function formatPostalCode(code: number): string {
    return String(code).padStart(8, '0');
}

/**
 * Postal-code ranges and weight brackets a table is generated over.
 * Built once and frozen; both sequences keep the order they were defined in.
 */
export class RangeCatalog {
    private readonly ranges: readonly PostalRange[];
    private readonly brackets: readonly WeightBracket[];

    constructor(definition: unknown) {
        const valid = validateCatalog(definition);
        this.ranges = Object.freeze(valid.postalRanges.map(r => Object.freeze({ ...r })));
        this.brackets = Object.freeze(valid.weightBrackets.map(b => Object.freeze({ ...b })));
    }

    /** One range per state, 26 in all, in a fixed order. */
    static brazil(): RangeCatalog {
        return new RangeCatalog(brazilCatalog);
    }

    static fromFile(filePath: string): RangeCatalog {
        let raw: string;
        try {
            raw = fs.readFileSync(filePath, 'utf-8');
        } catch (err) {
            throw new ValidationError(
                `Cannot read catalog file ${filePath}: ${err instanceof Error ? err.message : 'unknown error'}`,
            );
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (err) {
            throw new ValidationError(
                `Catalog file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : 'unknown error'}`,
            );
        }
        return new RangeCatalog(parsed);
    }

    postalRanges(): readonly PostalRange[] {
        return this.ranges;
    }

    weightBrackets(): readonly WeightBracket[] {
        return this.brackets;
    }

    get cellCount(): number {
        return this.ranges.length * this.brackets.length;
    }
}
