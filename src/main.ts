#!/usr/bin/env node
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { loadConfigOrExit } from './cli/startup';
import { createResearchSession } from './session/factory';
import { startShell } from './cli/shell';
import { COLORS, formatError, renderTriplesTable } from './cli/display';
import { dbg, say, setVerbose } from './utils';

const UNHANDLED_ERROR = 5;

// Load environment variables from .env file
dotenv.config();

async function main() {
  const program = new Command();

  program
    .name('research-shell')
    .version('1.0.0')
    .description('Interactive research assistant with web search, webpage summaries, research notes and knowledge graphs')
    .action(async () => {
      const config = loadConfigOrExit();
      setVerbose(config.verbose);
      dbg(`Using model: ${config.modelName}, max steps: ${config.maxSteps}`);

      const session = createResearchSession(config, {
        onKnowledgeGraph: (fragment) => {
          say(renderTriplesTable(fragment));
          say(COLORS.info('Knowledge graph generated! The Mermaid diagram is included in the answer.'));
        },
      });

      process.on('SIGINT', () => {
        say(`\n\n${COLORS.warning('Exiting...')}`);
        session.end();
        process.exit(0);
      });

      await startShell(session);
    });

  await program.parseAsync(process.argv);
}

main().catch(error => {
  console.error(formatError(error));
  process.exit(UNHANDLED_ERROR);
});
