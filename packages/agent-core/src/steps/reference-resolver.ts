/**
 * Reference Resolver
 *
 * Maps referring expressions in a user message onto entities the
 * conversation has already researched:
 * - anaphoric ("their", "it", "the company") -> last discussed entity
 * - contrastive ("the other one") -> most recent entity that is NOT
 *   the last discussed one
 */

export type ReferenceKind = 'anaphoric' | 'contrastive';

export interface EntityMemory {
    lastDiscussedEntity: string | null;
    discussedEntities: string[];
}

export interface ResolvedReference {
    entity: string;
    kind: ReferenceKind;
    /** The expression that triggered the resolution */
    cue: string;
}

const CONTRASTIVE_PATTERN =
    /\b(the other (?:one|company|firm|business)|the other|the previous (?:one|company)|the first (?:one|company))\b/i;

const ANAPHORIC_PATTERN =
    /\b(they|them|their|theirs|it|its|this company|that company|the company|the firm|same company|the same one)\b/i;

function sameEntity(a: string, b: string): boolean {
    return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Find the referring expression in a message, if any
 */
export function findReferenceCue(message: string): { kind: ReferenceKind; cue: string } | null {
    const contrastive = CONTRASTIVE_PATTERN.exec(message);
    if (contrastive) {
        return { kind: 'contrastive', cue: contrastive[1] };
    }
    const anaphoric = ANAPHORIC_PATTERN.exec(message);
    if (anaphoric) {
        return { kind: 'anaphoric', cue: anaphoric[1] };
    }
    return null;
}

/**
 * Resolve the message's reference against entity memory.
 * Returns null when there is no cue or nothing to point at.
 */
export function resolveReference(message: string, memory: EntityMemory): ResolvedReference | null {
    const found = findReferenceCue(message);
    if (!found) {
        return null;
    }

    const { lastDiscussedEntity, discussedEntities } = memory;

    if (found.kind === 'contrastive') {
        for (let i = discussedEntities.length - 1; i >= 0; i--) {
            const candidate = discussedEntities[i];
            if (!lastDiscussedEntity || !sameEntity(candidate, lastDiscussedEntity)) {
                return { entity: candidate, kind: 'contrastive', cue: found.cue };
            }
        }
        return null;
    }

    if (!lastDiscussedEntity) {
        return null;
    }
    return { entity: lastDiscussedEntity, kind: 'anaphoric', cue: found.cue };
}

/**
 * Move an entity to the most-recent end of the list, dropping duplicates
 */
export function rememberEntity(discussedEntities: string[], entity: string): string[] {
    return [...discussedEntities.filter((e) => !sameEntity(e, entity)), entity];
}
