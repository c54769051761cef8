#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import fs from 'fs-extra';
import { DatagramSocket, ServerSocket, UnixSocket, isLocalSocketSupported } from '../lib/sockets';
import { SocketError } from '../lib/errors';
import { NetworkInitializer } from '../lib/runtime';
import { DEFAULT_UNIX_PATH, loadDemoConfig } from './config';
import { Logger } from './logger';
import { askPort, prompt, requirePort } from './prompt';
import { reportFatal, resolveLogLevel } from './shared';
import type { CommonCliOptions } from './shared';

const UDP_TIMEOUT_MS = 5000;

async function testTcp(port: number, logger: Logger): Promise<void> {
  console.log(`[TCP] Starting server on port ${port}`);
  const server = await ServerSocket.open(port);
  try {
    await server.bind();
    server.listen();
    logger.debug(`Listening on ${server.getLocalSocketAddress()}`);
    console.log('[TCP] Waiting for client...');
    const conn = await server.accept();
    try {
      console.log(`[TCP] Client connected from: ${conn.getRemoteSocketAddress()}`);
      const message = await conn.read();
      console.log(`[TCP] Client says: ${message}`);
      await conn.write('Hello client! (TCP)');
    } finally {
      conn.close();
    }
  } finally {
    server.close();
  }
}

async function testUdp(port: number, logger: Logger): Promise<void> {
  console.log(`[UDP] Starting UDP server on port ${port}`);
  const udp = await DatagramSocket.open({ port });
  try {
    udp.setTimeout(UDP_TIMEOUT_MS);
    udp.setNonBlocking(false);
    logger.debug(`Bound to ${udp.getLocalSocketAddress()}`);
    const { data, address, port: senderPort } = await udp.receive();
    console.log(`[UDP] Got ${data.length} bytes from ${address}: ${data.toString()}`);
    await udp.sendTo('Hello client! (UDP)', address, senderPort);
  } finally {
    udp.close();
  }
}

async function testUnix(path: string, logger: Logger): Promise<void> {
  if (!isLocalSocketSupported()) {
    logger.warn('Local sockets are not available on this platform, skipping');
    return;
  }
  console.log(`[UNIX] Starting Unix domain socket server at ${path}`);
  const listener = await UnixSocket.open(path);
  try {
    await listener.bind();
    listener.listen();
    console.log('[UNIX] Waiting for client...');
    const client = await listener.accept();
    try {
      const message = await client.read();
      console.log(`[UNIX] Client says: ${message}`);
      await client.write('Hello client! (UNIX)');
    } finally {
      client.close();
    }
  } finally {
    listener.close();
    await fs.remove(path);
  }
}

async function testErrorHandling(): Promise<void> {
  console.log('[ERROR] Testing error handling...');
  let bad: ServerSocket | null = null;
  try {
    bad = await ServerSocket.open(0);
    await bad.bind();
    bad.listen();
  } catch (error) {
    if (!(error instanceof SocketError)) {
      throw error;
    }
    console.log(`[ERROR] Caught expected: ${error.message}`);
  } finally {
    bad?.close();
  }
}

const program = new Command();

program
  .name('sockwell-server')
  .description('Run the TCP, UDP and local socket server demonstrations')
  .version('0.1.0')
  .option('-p, --port <port>', 'TCP port to listen on; UDP uses the next port')
  .option('-u, --unix-path <path>', 'Path of the local socket')
  .option('--config <path>', 'Path to a JSON config file')
  .option('--log-level <level>', 'Log level (debug, info, warn, error)')
  .action(async (options: CommonCliOptions) => {
    const logger = new Logger();
    try {
      const config = await loadDemoConfig(options.config);
      logger.setLevel(resolveLogLevel(options.logLevel, config.logLevel));

      const tcpPort = options.port !== undefined
        ? requirePort(options.port)
        : config.port ?? await prompt(rl => askPort(rl, 'Type a port to start listening at: '));
      const unixPath = options.unixPath || config.unixPath || DEFAULT_UNIX_PATH;

      await NetworkInitializer.withNetwork(async () => {
        await testTcp(tcpPort, logger);
        await testUdp(tcpPort + 1, logger);
        await testUnix(unixPath, logger);
        await testErrorHandling();
      });
      console.log(chalk.green('All tests completed successfully.'));
    } catch (error) {
      reportFatal(error, logger);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  reportFatal(error, new Logger());
});
