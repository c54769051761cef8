#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { DatagramSocket, Socket, UnixSocket, isLocalSocketSupported } from '../lib/sockets';
import { SocketError } from '../lib/errors';
import { NetworkInitializer } from '../lib/runtime';
import { DEFAULT_UNIX_PATH, loadDemoConfig } from './config';
import { Logger } from './logger';
import { askPort, askQuestion, delay, prompt, requirePort } from './prompt';
import { reportFatal, resolveLogLevel } from './shared';
import type { CommonCliOptions } from './shared';

const UDP_ATTEMPTS = 5;
const UDP_TIMEOUT_MS = 1000;
const UNIX_ATTEMPTS = 5;
const UNIX_RETRY_MS = 1000;

interface ClientCliOptions extends CommonCliOptions {
  host?: string;
}

async function testTcp(host: string, port: number, logger: Logger): Promise<void> {
  const conn = await Socket.open(host, port);
  try {
    await conn.connect();
    logger.debug(`Connected from ${conn.getLocalSocketAddress()} to ${conn.getRemoteSocketAddress()}`);
    await conn.write('Hello server!');
    console.log(`Server says: ${await conn.read()}`);
  } finally {
    conn.close();
  }
}

async function testUdp(host: string, port: number, logger: Logger): Promise<void> {
  const udp = await DatagramSocket.open();
  try {
    udp.setTimeout(UDP_TIMEOUT_MS);
    for (let attempt = 1; attempt <= UDP_ATTEMPTS; attempt++) {
      await udp.sendTo('Hello server! (UDP)', host, port);
      try {
        const { data, address, port: senderPort } = await udp.receive();
        console.log(`[UDP] Server says: ${data.toString()} (from ${address}:${senderPort})`);
        return;
      } catch (error) {
        if (!(error instanceof SocketError) || !error.timedOut) {
          throw error;
        }
        logger.warn(`No UDP reply (attempt ${attempt}/${UDP_ATTEMPTS})`);
      }
    }
    throw new Error(`No UDP reply from ${host}:${port} after ${UDP_ATTEMPTS} attempts`);
  } finally {
    udp.close();
  }
}

async function connectUnix(path: string, logger: Logger): Promise<UnixSocket> {
  for (let attempt = 1; ; attempt++) {
    const conn = await UnixSocket.open(path);
    try {
      await conn.connect();
      return conn;
    } catch (error) {
      conn.close();
      if (!(error instanceof SocketError) || attempt >= UNIX_ATTEMPTS) {
        throw error;
      }
      logger.warn(`Local socket not ready (${error.code}), retrying`);
      await delay(UNIX_RETRY_MS);
    }
  }
}

async function testUnix(path: string, logger: Logger): Promise<void> {
  if (!isLocalSocketSupported()) {
    logger.warn('Local sockets are not available on this platform, skipping');
    return;
  }
  const conn = await connectUnix(path, logger);
  try {
    await conn.write('Hello server! (UNIX)');
    console.log(`[UNIX] Server says: ${await conn.read()}`);
  } finally {
    conn.close();
  }
}

const program = new Command();

program
  .name('sockwell-client')
  .description('Talk to sockwell-server over TCP, UDP and a local socket')
  .version('0.1.0')
  .option('-H, --host <host>', 'Server address')
  .option('-p, --port <port>', 'Server TCP port; UDP uses the next port')
  .option('-u, --unix-path <path>', 'Path of the server\'s local socket')
  .option('--config <path>', 'Path to a JSON config file')
  .option('--log-level <level>', 'Log level (debug, info, warn, error)')
  .action(async (options: ClientCliOptions) => {
    const logger = new Logger();
    try {
      const config = await loadDemoConfig(options.config);
      logger.setLevel(resolveLogLevel(options.logLevel, config.logLevel));

      const serverHost = options.host || config.host || await prompt(async rl =>
        (await askQuestion(rl, 'Type the IP to connect to (127.0.0.1 for this machine): ')).trim()
      );
      const serverPort = options.port !== undefined
        ? requirePort(options.port)
        : config.port ?? await prompt(rl => askPort(rl, 'Type the port to connect to: '));
      const unixPath = options.unixPath || config.unixPath || DEFAULT_UNIX_PATH;

      await NetworkInitializer.withNetwork(async () => {
        await testTcp(serverHost, serverPort, logger);
        await testUdp(serverHost, serverPort + 1, logger);
        await testUnix(unixPath, logger);
      });
      console.log(chalk.green('All tests completed successfully.'));
    } catch (error) {
      reportFatal(error, logger);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  reportFatal(error, new Logger());
});
