/**
 * @file Catalog builder
 *
 * Collects candidate entries into an immutable catalog before a selection
 * session starts. Entries are validated at the boundary: identifiers travel
 * over the finder's tab-delimited line protocol, so they must be non-empty
 * single-line strings without tabs.
 *
 * Usage:
 *   const catalog = new CatalogBuilder()
 *       .entry_add({ identifier: 'build', primaryLabel: 'build', secondaryLabel: 'Build project' })
 *       .catalog_build();
 *
 * @module
 */

import { z } from 'zod';
import type { Catalog, CatalogEntry } from '../picker/types.js';
import { DuplicateEntryError, InvalidEntryError } from '../picker/errors.js';

// ─── Schemas ─────────────────────────────────────────────────────────────────

function singleLine_check(value: string): boolean {
    return !/[\t\r\n]/.test(value);
}

const SINGLE_LINE_MESSAGE: string = 'must not contain tabs or line breaks';

export const CatalogEntryInputSchema = z.object({
    identifier:     z.string().min(1, 'must not be empty').refine(singleLine_check, SINGLE_LINE_MESSAGE),
    primaryLabel:   z.string().optional(),
    secondaryLabel: z.string().refine(singleLine_check, SINGLE_LINE_MESSAGE).optional()
});

export type CatalogEntryInput = z.infer<typeof CatalogEntryInputSchema>;

export type CatalogOrder = 'insertion' | 'identifier-ci';

// ─── Builder ─────────────────────────────────────────────────────────────────

/**
 * Accumulates entries and freezes them into a `Catalog`.
 */
export class CatalogBuilder {
    private readonly entries: CatalogEntry[] = [];
    private readonly identifiers: Set<string> = new Set<string>();

    /**
     * Add one entry. `primaryLabel` defaults to the identifier and
     * `secondaryLabel` to the empty string.
     *
     * @throws InvalidEntryError when the input fails validation.
     * @throws DuplicateEntryError when the identifier is already present.
     */
    public entry_add(input: CatalogEntryInput): this {
        const parsed = CatalogEntryInputSchema.safeParse(input);
        if (!parsed.success) {
            const issue: string = parsed.error.issues
                .map((i: z.ZodIssue): string => `${i.path.join('.')} ${i.message}`)
                .join('; ');
            throw new InvalidEntryError(String(input.identifier), issue);
        }

        const { identifier, primaryLabel, secondaryLabel } = parsed.data;
        if (this.identifiers.has(identifier)) {
            throw new DuplicateEntryError(identifier);
        }

        this.identifiers.add(identifier);
        this.entries.push(Object.freeze({
            identifier,
            primaryLabel: primaryLabel ?? identifier,
            secondaryLabel: secondaryLabel ?? ''
        }));
        return this;
    }

    /**
     * Whether an identifier has been added.
     */
    public entry_has(identifier: string): boolean {
        return this.identifiers.has(identifier);
    }

    /**
     * Freeze the collected entries.
     *
     * @param order - `insertion` keeps the add order; `identifier-ci` sorts
     *   case-insensitively by identifier, exact identifier breaking ties.
     */
    public catalog_build(order: CatalogOrder = 'insertion'): Catalog {
        const list: CatalogEntry[] = [...this.entries];
        if (order === 'identifier-ci') {
            list.sort(identifierCaseless_compare);
        }
        return Object.freeze(list);
    }
}

function identifierCaseless_compare(a: CatalogEntry, b: CatalogEntry): number {
    const left: string = a.identifier.toLowerCase();
    const right: string = b.identifier.toLowerCase();
    if (left !== right) return left < right ? -1 : 1;
    if (a.identifier === b.identifier) return 0;
    return a.identifier < b.identifier ? -1 : 1;
}
