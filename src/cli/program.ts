import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_FILE, loadConfig, type RuntimeConfig } from '../config/loader.js';
import { createBrokerRegistry } from '../brokers/factory.js';
import type { BrokerQuery } from '../brokers/adapter.js';
import { AncestryAggregator } from '../classification/aggregator.js';
import { parseClassificationRecords } from '../classification/records.js';
import { Logger } from '../logging/logger.js';
import { loadTaxonomy, DEFAULT_TAXONOMY_PATH } from '../taxonomy/loader.js';
import { readJSON } from '../util/fs.js';
import { withCommandHandler } from './command-error-handler.js';
import { formatAlert, renderTree } from './render.js';

interface ConfigOption {
  config?: string;
}

interface AlertsOptions extends ConfigOption {
  ids?: string;
  mjdMin?: number;
  mjdMax?: number;
  query?: string;
  limit?: number;
  offset?: number;
  json?: boolean;
}

interface AggregateOptions extends ConfigOption {
  taxonomy?: string;
  json?: boolean;
}

const toInt = (value: string): number => Number.parseInt(value, 10);
const toFloat = (value: string): number => Number.parseFloat(value);

/**
 * An explicit --config must exist; the default file is optional.
 */
async function configFor(opts: ConfigOption): Promise<RuntimeConfig> {
  return loadConfig(opts.config ?? DEFAULT_CONFIG_FILE, { optional: opts.config === undefined });
}

function loggerFor(config: RuntimeConfig): Logger {
  return new Logger({
    source: 'taxalert',
    level: config.logging.level,
    console: config.logging.console,
    file: config.logging.file,
    logDir: config.logging.logDir,
  });
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('taxalert')
    .description('Query astronomical alert brokers and merge their classifications into one taxonomy')
    .version('0.1.0');

  // ─── brokers ──────────────────────────────────────────
  program
    .command('brokers')
    .description('List the brokers enabled in the config')
    .option('-c, --config <path>', `Path to ${DEFAULT_CONFIG_FILE}`)
    .action(withCommandHandler(async (opts: ConfigOption) => {
      const config = await configFor(opts);
      const registry = createBrokerRegistry(config, loggerFor(config));
      for (const name of registry.names()) {
        const adapter = registry.get(name);
        const extras = adapter.supportsFreeform ? chalk.dim(' (free-form queries)') : '';
        console.log(`${name}${extras}`);
      }
    }));

  // ─── alerts ───────────────────────────────────────────
  program
    .command('alerts <broker>')
    .description('Fetch alerts from one broker; the first populated query method wins')
    .option('-c, --config <path>', `Path to ${DEFAULT_CONFIG_FILE}`)
    .option('--ids <ids>', 'Object ID or comma separated list')
    .option('--mjd-min <mjd>', 'Min MJD of last detection', toFloat)
    .option('--mjd-max <mjd>', 'Max MJD of last detection', toFloat)
    .option('-q, --query <text>', 'Free-form query (brokers that support it)')
    .option('-n, --limit <n>', 'Max number of alerts to return', toInt)
    .option('--offset <n>', 'Skip this many results', toInt)
    .option('--json', 'Print alerts as JSON lines')
    .action(withCommandHandler(async (broker: string, opts: AlertsOptions) => {
      const config = await configFor(opts);
      const logger = loggerFor(config);
      const registry = createBrokerRegistry(config, logger);

      const parameters: BrokerQuery = {
        identifiers: opts.ids,
        mjdMin: opts.mjdMin,
        mjdMax: opts.mjdMax,
        freeform: opts.query,
        limit: opts.limit,
        offset: opts.offset,
      };

      let delivered = 0;
      let failed = 0;
      for await (const outcome of registry.listAlerts(broker, parameters)) {
        if (outcome.ok) {
          delivered++;
          console.log(opts.json ? JSON.stringify(outcome.alert) : formatAlert(outcome.alert));
        } else {
          failed++;
          console.error(chalk.yellow(`skipped malformed item: ${outcome.error.message}`));
        }
      }

      if (!opts.json) {
        const summary = `${delivered} alert(s)` + (failed > 0 ? `, ${failed} malformed` : '');
        console.log(chalk.dim(summary));
      }
    }));

  // ─── aggregate ────────────────────────────────────────
  program
    .command('aggregate <records>')
    .description('Merge classification records (JSON array) into a weighted taxonomy tree')
    .option('-c, --config <path>', `Path to ${DEFAULT_CONFIG_FILE}`)
    .option('-t, --taxonomy <path>', 'Taxonomy document (overrides config)')
    .option('--json', 'Print the {label, parent, weight} list as JSON')
    .action(withCommandHandler(async (recordsPath: string, opts: AggregateOptions) => {
      const config = await configFor(opts);
      const logger = loggerFor(config);
      const table = await loadTaxonomy(opts.taxonomy ?? config.taxonomy.path, {
        maxHops: config.taxonomy.maxHops,
        logger,
      });

      const records = parseClassificationRecords(await readJSON(recordsPath));
      const tree = new AncestryAggregator(table).aggregate(records);
      logger.event({
        type: 'aggregation-completed',
        records: records.length,
        nodes: tree.nodes.length,
        unmapped: tree.unmapped,
      });

      if (opts.json) {
        console.log(
          JSON.stringify(
            tree.nodes.map(({ label, parent, weight }) => ({ label, parent, weight })),
            null,
            2,
          ),
        );
        return;
      }

      for (const line of renderTree(tree)) {
        console.log(line.node.mapped ? line.text : chalk.yellow(line.text));
      }
      if (tree.unmapped.length > 0) {
        console.log(chalk.yellow(`Unmapped labels: ${tree.unmapped.join(', ')}`));
      }
    }));

  // ─── taxonomy ─────────────────────────────────────────
  const taxonomy = program.command('taxonomy').description('Inspect taxonomy documents');

  taxonomy
    .command('check [path]')
    .description('Validate a taxonomy document (defaults to the bundled one)')
    .option('-c, --config <path>', `Path to ${DEFAULT_CONFIG_FILE}`)
    .action(withCommandHandler(async (path: string | undefined, opts: ConfigOption) => {
      const config = await configFor(opts);
      const target = path ?? config.taxonomy.path ?? DEFAULT_TAXONOMY_PATH;
      const table = await loadTaxonomy(target, { maxHops: config.taxonomy.maxHops });
      console.log(chalk.green(`✓ ${target} is valid`));
      console.log(`  codes:   ${table.codes().length}`);
      console.log(`  brokers: ${table.brokers().join(', ') || '(none)'}`);
    }));

  return program;
}
