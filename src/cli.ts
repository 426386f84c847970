import { Command } from 'commander';
import { existsSync } from 'fs';
import { join, resolve } from 'path';

import type { StorageType, TagenvConfig } from './types';
import {
  configDirectory,
  getConfigPath,
  loadConfigFile,
  mergeConfigWithOptions,
  parseConfig,
  resolveEncryptionKey,
  saveConfigFile
} from './helpers/config';
import type { ConfigOverrides } from './helpers/config';
import { encodeKey, generateKey, saveKeyFile } from './helpers/crypto';
import { generateReadableDiff, hasChanges, summarizeDiff } from './helpers/diff';
import { getCurrentVersion, isGitRepository, resolveTag } from './helpers/git';
import { promptChoice, promptConfirmation, promptInput } from './helpers/prompt';
import { diffTags, listTags, pullFiles, pushFiles, removeTag } from './helpers/sync';
import type { SyncContext } from './helpers/sync';
import { createStorage, describeStorage } from './storage';

export const VERSION = '0.1.0';
const DEFAULT_KEY_FILE = '.tagenv.key';

interface GlobalOptions {
  config?: string;
}

interface TransferOptions extends ConfigOverrides {
  tag?: string;
}

interface PullCommandOptions extends TransferOptions {
  force?: boolean;
}

interface Workspace {
  config: TagenvConfig;
  baseDir: string;
  context: SyncContext;
}

function configPathOf(program: Command): string {
  const { config } = program.opts<GlobalOptions>();
  return resolve(config ?? getConfigPath());
}

/**
 * Loads the config next to which env files, key file and a local storage
 * directory are resolved, and builds the pipeline context from it.
 */
async function openWorkspace(program: Command, overrides: ConfigOverrides = {}): Promise<Workspace> {
  const configPath = configPathOf(program);
  const baseDir = configDirectory(configPath);
  const config = mergeConfigWithOptions(await loadConfigFile(configPath), overrides);
  const key = await resolveEncryptionKey(config, { baseDir });

  return {
    config,
    baseDir,
    context: {
      storage: createStorage(config.storage, { baseDir }),
      files: config.envFiles,
      encryption: {
        enabled: config.encryption.enabled,
        key,
        allowPlaintext: config.encryption.allowPlaintext
      },
      cwd: baseDir
    }
  };
}

async function promptStorageFields(type: StorageType): Promise<Record<string, string>> {
  switch (type) {
    case 's3':
      return {
        bucket: await promptInput('S3 bucket name:'),
        region: await promptInput('AWS region (e.g., us-west-2):')
      };
    case 'azure':
      return {
        accountName: await promptInput('Azure storage account name:'),
        containerName: await promptInput('Container name:')
      };
    case 'gcs':
      return {
        projectId: await promptInput('GCS project ID:'),
        bucketName: await promptInput('GCS bucket name:')
      };
    case 'local':
      return {
        directory: await promptInput('Directory to store versions in:', '.tagenv-store')
      };
  }
}

async function runInit(program: Command, options: { force?: boolean }): Promise<void> {
  const configPath = configPathOf(program);
  const baseDir = configDirectory(configPath);

  console.log('🔧 tagenv initialization\n');

  if (existsSync(configPath) && !options.force) {
    const overwrite = await promptConfirmation(`Configuration file ${configPath} already exists. Overwrite?`);
    if (!overwrite) {
      console.log('Initialization cancelled.');
      return;
    }
  }

  const type = await promptChoice<StorageType>('Select storage type:', [
    { name: 'AWS S3', value: 's3' },
    { name: 'Azure Blob Storage', value: 'azure' },
    { name: 'Google Cloud Storage', value: 'gcs' },
    { name: 'Local directory', value: 'local' }
  ]);
  const storage: Record<string, string> = { type, ...(await promptStorageFields(type)) };

  const prefix = await promptInput('Storage path prefix (optional, press Enter to skip):');
  if (prefix) storage.prefix = prefix;

  const envFiles = (await promptInput('Environment file path(s), comma-separated:', '.env'))
    .split(',')
    .map(file => file.trim())
    .filter(Boolean);

  const encryption: Record<string, string | boolean> = {
    enabled: await promptConfirmation('Enable encryption?', true)
  };

  let keyFile: string | undefined;
  const key = generateKey();
  if (encryption.enabled) {
    const keyLocation = await promptChoice('Where should the encryption key be kept?', [
      { name: 'In the configuration file', value: 'inline' },
      { name: `In a separate key file (${DEFAULT_KEY_FILE})`, value: 'file' }
    ]);
    if (keyLocation === 'file') {
      keyFile = DEFAULT_KEY_FILE;
      encryption.keyFile = keyFile;
    } else {
      encryption.key = encodeKey(key);
    }
  }

  const config = parseConfig({ storage, encryption, envFiles });
  await saveConfigFile(config, configPath);
  console.log(`✅ Configuration saved to ${configPath}`);

  if (keyFile) {
    const keyPath = join(baseDir, keyFile);
    await saveKeyFile(keyPath, key);
    console.log(`🔑 Encryption key written to ${keyPath}`);
    console.log('   Keep it out of version control and share it with your team securely');
  } else if (config.encryption.enabled) {
    console.log('🔑 Encryption key generated and saved to the configuration file');
  }

  console.log('\nNext steps:');
  console.log("  tagenv push    Upload your environment files");
  console.log("  tagenv pull    Download environment files");
  console.log("  tagenv list    See all stored versions");
}

async function runPush(program: Command, options: TransferOptions): Promise<void> {
  const { config, baseDir, context } = await openWorkspace(program, options);
  const tag = await resolveTag(options.tag, baseDir);
  console.log(options.tag ? `Using explicit tag: ${tag}` : `Auto-detected version from Git: ${tag}`);
  console.log(`Uploading to ${describeStorage(config.storage)}`);

  const result = await pushFiles(tag, context);
  const details = [
    `${result.files.length} file${result.files.length === 1 ? '' : 's'}`,
    `${result.bytes} bytes`,
    result.encrypted ? 'encrypted' : 'unencrypted'
  ];
  console.log(`✅ Successfully pushed tag ${tag} (${details.join(', ')})`);
}

async function runPull(program: Command, options: PullCommandOptions): Promise<void> {
  const { config, baseDir, context } = await openWorkspace(program, options);
  const tag = await resolveTag(options.tag, baseDir);
  console.log(options.tag ? `Using explicit tag: ${tag}` : `Auto-detected version from Git: ${tag}`);
  console.log(`Downloading from ${describeStorage(config.storage)}`);

  const result = await pullFiles(tag, context, {
    force: options.force,
    confirm: message => promptConfirmation(message)
  });
  if (result.status === 'cancelled') {
    console.log('Pull cancelled.');
    return;
  }
  console.log(`✅ Successfully pulled tag ${tag} into ${result.files.join(', ')}`);
}

async function runList(program: Command): Promise<void> {
  const { config, baseDir, context } = await openWorkspace(program);
  console.log(`Fetching versions from ${describeStorage(config.storage)}`);

  const tags = await listTags(context.storage);
  if (tags.length === 0) {
    console.log('No versions found in storage.');
    return;
  }

  const current = (await isGitRepository(baseDir))
    ? await getCurrentVersion(baseDir).catch(() => undefined)
    : undefined;

  console.log(`\nAvailable versions (${tags.length} total):`);
  for (const tag of tags) {
    console.log(`${tag === current ? '* ' : '  '}${tag}`);
  }
  if (current) {
    console.log(`\n* = current version (${current})`);
  }
}

async function runDiff(program: Command, fromTag: string, toTag: string): Promise<void> {
  const { context } = await openWorkspace(program);
  const diff = await diffTags(fromTag, toTag, context);

  console.log(`\nDifferences between ${fromTag} and ${toTag}:`);
  if (!hasChanges(diff)) {
    console.log('No differences found.');
    return;
  }
  for (const line of generateReadableDiff(diff)) {
    console.log(`  ${line}`);
  }
  console.log(`\nSummary: ${summarizeDiff(diff)}`);
}

async function runDelete(program: Command, tag: string, options: { force?: boolean }): Promise<void> {
  const { context } = await openWorkspace(program);
  if (!options.force) {
    const confirmed = await promptConfirmation(`Delete tag '${tag}' from storage?`);
    if (!confirmed) {
      console.log('Delete cancelled.');
      return;
    }
  }
  await removeTag(tag, context.storage);
  console.log(`✅ Deleted tag ${tag}`);
}

async function runKeygen(options: { out?: string }): Promise<void> {
  const key = generateKey();
  if (!options.out) {
    console.log(encodeKey(key));
    return;
  }
  const keyPath = resolve(options.out);
  await saveKeyFile(keyPath, key);
  console.log(`🔑 Encryption key written to ${keyPath}`);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tagenv')
    .description('Version environment files by Git tag and keep them in object storage')
    .version(VERSION)
    .option('-c, --config <path>', 'Path to the configuration file');

  program
    .command('init')
    .description('Create a .tagenv.yml configuration file')
    .option('-f, --force', 'Overwrite an existing configuration without asking')
    .action((options: { force?: boolean }) => runInit(program, options));

  program
    .command('push')
    .description('Upload environment files under the current Git tag/branch or --tag')
    .option('-t, --tag <tag>', 'Explicit tag to use (defaults to current Git tag/branch)')
    .option('--env-file <paths...>', 'Environment files to push instead of the configured ones')
    .option('--prefix <prefix>', 'Storage key prefix to use instead of the configured one')
    .action((options: TransferOptions) => runPush(program, options));

  program
    .command('pull')
    .description('Download environment files for the current Git tag/branch or --tag')
    .option('-t, --tag <tag>', 'Explicit tag to use (defaults to current Git tag/branch)')
    .option('-f, --force', 'Overwrite local files without confirmation')
    .option('--env-file <paths...>', 'Environment files to write instead of the configured ones')
    .option('--prefix <prefix>', 'Storage key prefix to use instead of the configured one')
    .action((options: PullCommandOptions) => runPull(program, options));

  program
    .command('list')
    .alias('ls')
    .description('List all stored versions')
    .action(() => runList(program));

  program
    .command('diff <from> <to>')
    .description('Show added, removed and changed variables between two versions')
    .action((fromTag: string, toTag: string) => runDiff(program, fromTag, toTag));

  program
    .command('delete <tag>')
    .alias('rm')
    .description('Delete a stored version')
    .option('-f, --force', 'Delete without confirmation')
    .action((tag: string, options: { force?: boolean }) => runDelete(program, tag, options));

  program
    .command('keygen')
    .description('Generate a new encryption key')
    .option('-o, --out <file>', 'Write the key to a file (mode 600) instead of printing it')
    .action((options: { out?: string }) => runKeygen(options));

  return program;
}
