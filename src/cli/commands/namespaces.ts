/**
 * Namespaces Command
 *
 * Inspects the vector store:
 *   tender-insight namespaces list           - Table of namespaces
 *   tender-insight namespaces clear <id>     - Remove every chunk (requires --force)
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { NamespaceIdSchema, validateInput } from '../validation.js';
import { openStore } from '../utils/store.js';
import { loadConfig } from '../../config/index.js';
import { CLIError, ValidationError } from '../../errors/index.js';
import type { VectorStore } from '../../store/index.js';
import { formatTable, type Column } from '../../utils/table.js';

interface ClearOptions {
  force?: boolean;
}

async function withStore<T>(fn: (store: VectorStore) => Promise<T>): Promise<T> {
  const store = openStore(loadConfig());
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}

function createListSubcommand(getContext: () => CommandContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List namespaces in the vector store')
    .action(async () => {
      const ctx = getContext();
      const namespaces = await withStore((store) => store.listNamespaces());
      ctx.debug(`Found ${namespaces.length} namespace(s)`);

      if (ctx.options.json) {
        console.log(JSON.stringify({ count: namespaces.length, namespaces }, null, 2));
        return;
      }

      if (namespaces.length === 0) {
        ctx.log(chalk.yellow('No namespaces yet.'));
        ctx.log(`  ${chalk.cyan('tender-insight analyze ./tender.txt')}`);
        return;
      }

      const columns: Column[] = [
        { header: 'Namespace', key: 'id' },
        { header: 'Documents', key: 'documents', align: 'right' },
        { header: 'Chunks', key: 'chunks', align: 'right' },
      ];
      ctx.log(
        formatTable(
          columns,
          namespaces.map((ns) => ({
            id: ns.namespaceId,
            documents: ns.documentCount.toLocaleString(),
            chunks: ns.chunkCount.toLocaleString(),
          }))
        )
      );
    });
}

function createClearSubcommand(getContext: () => CommandContext): Command {
  return new Command('clear')
    .argument('<id>', 'Namespace to clear')
    .description('Remove every chunk in a namespace')
    .option('-f, --force', 'Skip confirmation')
    .action(async (id: string, options: ClearOptions) => {
      const ctx = getContext();
      const parsed = validateInput(NamespaceIdSchema, id);
      if (!parsed.success) {
        throw new ValidationError(parsed.error);
      }

      await withStore(async (store) => {
        const count = await store.count(id);
        if (count === 0) {
          throw new CLIError(
            `Namespace not found or empty: ${id}`,
            'Run: tender-insight namespaces list  to see available namespaces'
          );
        }

        if (!options.force && !ctx.options.json) {
          ctx.log(chalk.yellow(`This will delete ${count.toLocaleString()} chunks from "${id}".`));
          ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
          process.exitCode = 1;
          return;
        }

        const removed = await store.clear(id);
        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, namespace: id, removed }));
        } else {
          ctx.log(`${chalk.green('✓')} Cleared "${chalk.cyan(id)}" (${removed.toLocaleString()} chunks)`);
        }
      });
    });
}

/**
 * Create the namespaces command
 */
export function createNamespacesCommand(getContext: () => CommandContext): Command {
  return new Command('namespaces')
    .alias('ns')
    .description('Inspect and clear vector store namespaces')
    .addCommand(createListSubcommand(getContext))
    .addCommand(createClearSubcommand(getContext));
}
