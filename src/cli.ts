import { Command } from 'commander';

import { Cassette } from './Cassette.js';

interface CassetteCommandOptions {
  gzip?: boolean;
}

async function inspectCassette(
  name: string,
  options: CassetteCommandOptions,
): Promise<void> {
  const cassette = await Cassette.load(name, {
    compressionEnabled: options.gzip ?? false,
  });

  console.log(`Cassette: ${cassette.file}`);
  console.log(`Version: ${cassette.version}`);
  console.log(`Interactions: ${cassette.interactions.length}`);
  if (cassette.needsUpgrade) {
    console.log('Fingerprints missing or stale, run "upgrade" to store them');
  }
  for (const interaction of cassette.interactions) {
    const { request, response } = interaction;
    console.log(
      `  #${interaction.id} ${request.method} ${request.url} -> ${response.code} (${response.duration}ms)`,
    );
  }
}

async function upgradeCassette(
  name: string,
  options: CassetteCommandOptions,
): Promise<void> {
  const cassette = await Cassette.load(name, {
    compressionEnabled: options.gzip ?? false,
  });

  if (await cassette.upgrade()) {
    console.log(`Upgraded ${cassette.file}`);
  } else {
    console.log(`${cassette.file} is up to date`);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('http-cassette')
    .description('Inspect and maintain recorded HTTP cassettes');

  program
    .command('inspect')
    .description('List the interactions stored in a cassette')
    .argument('<name>', 'Cassette name without extension (e.g., fixtures/users)')
    .option('-z, --gzip', 'Read the gzip-compressed cassette (.yaml.gz)')
    .action(inspectCassette);

  program
    .command('upgrade')
    .description('Store fingerprints missing from a legacy cassette')
    .argument('<name>', 'Cassette name without extension (e.g., fixtures/users)')
    .option('-z, --gzip', 'Read the gzip-compressed cassette (.yaml.gz)')
    .action(upgradeCassette);

  return program;
}
