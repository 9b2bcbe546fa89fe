#!/usr/bin/env node

import * as dotenv from 'dotenv';
import * as path from 'path';
import { defineCommand, runMain, showUsage } from 'citty';

import { DaemonConfig } from './config/daemon-config';
import { createDefaultConfigFile, startDaemon } from './core/daemon';
import { gracefulShutdown, printErrorAndExit } from './utils/utils';

const envFiles = [
  '.env.local',
  `.env.${process.env.NODE_ENV}`,
  '.env'
];

envFiles.forEach(file => {
  const envPath = path.resolve(process.cwd(), file);
  dotenv.config({ path: envPath });
});

async function start(config: DaemonConfig): Promise<void> {
  console.log('🚀 Starting logalert-daemon...');
  console.log(`📦 Version: ${process.env.npm_package_version || 'unknown'}`);
  console.log(`🌍 Environment: ${config.getNodeEnv()}`);

  try {
    const { monitor, healthServer } = await startDaemon(config);

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM', monitor, healthServer));
    process.on('SIGINT', () => gracefulShutdown('SIGINT', monitor, healthServer));

    console.log('🔄 logalert-daemon is running. Press Ctrl+C to stop.');
  } catch (error) {
    printErrorAndExit(`💥 Failed to start logalert-daemon: ${error}`, 1);
  }
}

const main = defineCommand({
  meta: {
    name: 'logalert',
    description: 'Tails log files and raises alerts on matching patterns',
  },
  args: {
    'create-config': {
      type: 'boolean',
      alias: 'c',
      description: 'Write the default configuration to MONITOR_CONFIG_PATH',
    },
    start: {
      type: 'boolean',
      alias: 's',
      description: 'Start monitoring until interrupted',
    },
  },
  async run({ args, cmd }) {
    let config: DaemonConfig;
    try {
      config = DaemonConfig.fromEnvironment();
    } catch (error) {
      printErrorAndExit(`${error instanceof Error ? error.message : error}`, 1);
    }

    if (args['create-config']) {
      process.exit(createDefaultConfigFile(config));
    }

    if (args.start) {
      await start(config);
      return;
    }

    await showUsage(cmd);
  },
});

runMain(main);
