/**
 * Group mapping loader
 * Two-column CSV without header: leaf id, group label
 *
 *   species1,GroupA
 *   species2,GroupA
 *   species3,GroupB
 */

import { GroupMapping } from './types.js';

function unquote(field: string): string {
    const trimmed = field.trim();
    if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
        return trimmed.slice(1, -1).replace(/""/g, '"').trim();
    }
    return trimmed;
}

/**
 * Parse mapping text. Blank lines and rows without a group are ignored;
 * an id listed twice keeps its last group.
 */
export function loadGroupMapping(content: string): Map<string, string> {
    if (content.charCodeAt(0) === 0xFEFF) {
        content = content.slice(1);
    }

    const mapping = new Map<string, string>();
    for (const line of content.split(/\r?\n/)) {
        if (!line.trim()) continue;
        const [rawId, rawGroup] = line.split(',');
        if (rawGroup === undefined) continue;

        const id = unquote(rawId);
        const group = unquote(rawGroup);
        if (!id || !group) continue;
        mapping.set(id, group);
    }
    return mapping;
}

/** group -> ids, in first-seen order */
export function groupMembers(mapping: GroupMapping): Map<string, string[]> {
    const members = new Map<string, string[]>();
    for (const [id, group] of mapping) {
        const list = members.get(group);
        if (list) list.push(id);
        else members.set(group, [id]);
    }
    return members;
}
