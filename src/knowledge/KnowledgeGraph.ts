/**
 * Knowledge graph fragments: triples parsed from a single model reply, rendered as Mermaid markdown.
 * Fragments are never merged or stored.
 */

export interface Triple {
    head: string;
    relation: string;
    tail: string;
}

export interface KnowledgeGraphFragment {
    topic: string;
    triples: Triple[];
}

export interface GraphStats {
    entities: number;
    relationTypes: number;
    connections: number;
}

const TRIPLE_SEPARATOR = ' | ';
const LIST_MARKER = /^(?:\d+[.)]|[-*•])\s+/;
const PERSON_INDICATORS = ['dr.', 'professor', 'mr.', 'mrs.', 'ms.'];

/**
 * Reads `head | relation | tail` lines. Lines with any other number of parts, or an empty part, are skipped.
 */
export function parseTriples(text: string): Triple[] {
    const triples: Triple[] = [];
    for (const rawLine of text.split('\n')) {
        const line = rawLine.trim().replace(LIST_MARKER, '');
        if (!line.includes(TRIPLE_SEPARATOR)) {
            continue;
        }
        const parts = line.split(TRIPLE_SEPARATOR).map(part => part.trim());
        if (parts.length !== 3 || parts.some(part => part === '')) {
            continue;
        }
        const [head, relation, tail] = parts;
        triples.push({ head, relation, tail });
    }
    return triples;
}

/** Node ids in first-seen order, head before tail. */
export function assignNodeIds(triples: Triple[]): Map<string, string> {
    const ids = new Map<string, string>();
    for (const { head, tail } of triples) {
        for (const entity of [head, tail]) {
            if (!ids.has(entity)) {
                ids.set(entity, `Node${ids.size}`);
            }
        }
    }
    return ids;
}

export function isPerson(entity: string): boolean {
    const lower = entity.toLowerCase();
    return PERSON_INDICATORS.some(indicator => lower.includes(indicator));
}

function escapeLabel(label: string): string {
    return label.replace(/"/g, '#quot;');
}

export function toMermaid(fragment: KnowledgeGraphFragment): string {
    const ids = assignNodeIds(fragment.triples);
    const lines = ['graph TD'];

    for (const [entity, id] of ids) {
        lines.push(`    ${id}["${escapeLabel(entity)}"]`);
    }
    for (const { head, relation, tail } of fragment.triples) {
        lines.push(`    ${ids.get(head)} -->|"${escapeLabel(relation)}"| ${ids.get(tail)}`);
    }

    lines.push('    classDef default fill:#f9f9f9,stroke:#333,stroke-width:1px;');
    lines.push('    classDef concept fill:#d4f1f9,stroke:#0096c7,stroke-width:2px;');
    lines.push('    classDef person fill:#ffea00,stroke:#e6a700,stroke-width:2px;');
    for (const [entity, id] of ids) {
        lines.push(`    class ${id} ${isPerson(entity) ? 'person' : 'concept'};`);
    }
    return lines.join('\n') + '\n';
}

export function graphStats(fragment: KnowledgeGraphFragment): GraphStats {
    const entities = new Set<string>();
    const relationTypes = new Set<string>();
    for (const { head, relation, tail } of fragment.triples) {
        entities.add(head);
        entities.add(tail);
        relationTypes.add(relation);
    }
    return { entities: entities.size, relationTypes: relationTypes.size, connections: fragment.triples.length };
}

/**
 * Markdown with a heading, a fenced Mermaid diagram and summary counts.
 */
export function renderKnowledgeGraph(fragment: KnowledgeGraphFragment): string {
    const heading = `### Knowledge Graph: ${fragment.topic}\n\n`;
    if (fragment.triples.length === 0) {
        return `${heading}No relationships could be extracted for ${fragment.topic}.\n`;
    }
    const stats = graphStats(fragment);
    return heading
        + '```mermaid\n' + toMermaid(fragment) + '```\n\n'
        + `**Entities:** ${stats.entities}\n`
        + `**Relationship Types:** ${stats.relationTypes}\n`
        + `**Connections:** ${stats.connections}\n`;
}
