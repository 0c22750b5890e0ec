import chalk from 'chalk';
import stringWidth from 'string-width';
import { KnowledgeGraphFragment } from '../knowledge/KnowledgeGraph';
import { ToolInvocationRecord } from '../tools/types';
import { AppError } from '../errors';
import { errorMessage } from '../utils';

export const COLORS = {
    primary: chalk.cyan,
    secondary: chalk.green,
    accent: chalk.yellow,
    info: chalk.blue,
    warning: chalk.yellow,
    error: chalk.red,
    muted: chalk.gray,
};

const EXAMPLES = [
    'Search for information about quantum computing',
    'Summarize the webpage https://example.com/article',
    'Generate research notes on climate change',
    'Create a knowledge graph about artificial intelligence',
    'What can you tell me about machine learning?',
];

/** Pads to a terminal column width, ignoring color codes and counting wide characters twice. */
function padEnd(str: string, width: number): string {
    return str + ' '.repeat(Math.max(0, width - stringWidth(str)));
}

/** Frames lines in a rounded box with a title in the top border. */
export function boxed(title: string, lines: string[]): string {
    const width = Math.max(stringWidth(title) + 2, ...lines.map(line => stringWidth(line))) + 2;
    const titleRun = ` ${title} `;
    const top = COLORS.primary('╭─') + titleRun + COLORS.primary('─'.repeat(Math.max(0, width - stringWidth(titleRun) - 1)) + '╮');
    const body = lines.map(line => COLORS.primary('│') + ' ' + padEnd(line, width - 2) + ' ' + COLORS.primary('│'));
    const bottom = COLORS.primary('╰' + '─'.repeat(width) + '╯');
    return [top, ...body, bottom].join('\n');
}

export function welcomeText(): string {
    const lines = [
        'This assistant can:',
        '',
        `  • ${COLORS.accent('search')} the web using Wikipedia and DuckDuckGo`,
        `  • ${COLORS.accent('summarize')} the content of a webpage`,
        `  • ${COLORS.accent('write')} structured research notes`,
        `  • ${COLORS.accent('draw')} a knowledge graph of a topic`,
        '  • remember the conversation so far',
        '',
        'Try one of these:',
        ...EXAMPLES.map(example => `  - "${example}"`),
        '',
        `Type ${COLORS.accent("'exit'")} to quit, or ${COLORS.accent("'help'")} to see this message again.`,
    ];
    return boxed(chalk.bold.cyan('Research Shell'), lines);
}

/**
 * Three-column table of a fragment's triples, drawn with box characters.
 */
export function renderTriplesTable(fragment: KnowledgeGraphFragment): string {
    const headers = ['Entity', 'Relationship', 'Connected Entity'];
    const rows = fragment.triples.map(t => [t.head, t.relation, t.tail]);
    const widths = headers.map((header, col) => Math.max(stringWidth(header), ...rows.map(row => stringWidth(row[col]))));
    const colorFor = [COLORS.primary, COLORS.accent, COLORS.secondary];

    const rule = (left: string, mid: string, right: string) =>
        left + widths.map(w => '─'.repeat(w + 2)).join(mid) + right;
    const line = (cells: string[], colored: boolean) =>
        '│' + cells.map((cell, col) => ' ' + padEnd(colored ? colorFor[col](cell) : chalk.bold(cell), widths[col]) + ' ').join('│') + '│';

    return [
        chalk.bold(`Knowledge Graph: ${fragment.topic}`),
        rule('╭', '┬', '╮'),
        line(headers, false),
        rule('├', '┼', '┤'),
        ...rows.map(row => line(row, true)),
        rule('╰', '┴', '╯'),
    ].join('\n');
}

export function formatInvocation(record: ToolInvocationRecord): string {
    const marker = record.status === 'ok' ? COLORS.secondary('✓') : COLORS.error('✗');
    return COLORS.muted(`  ${marker} ${record.tool}(${record.input})`);
}

export function formatError(error: unknown): string {
    const lines = [COLORS.error(`Error: ${errorMessage(error)}`)];
    const hint = error instanceof AppError && error.hint ? error.hint : 'Try a different question or check your setup.';
    lines.push(COLORS.info(hint));
    return lines.join('\n');
}
