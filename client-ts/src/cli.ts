/**
 * stomp-ws CLI
 * Listen on a STOMP destination over WebSocket, or publish one message to it
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import { StompClient } from './client';
import type { ClientOptions } from './client';
import { formatIncoming, formatJsonPayload } from './cli/payload';
import { formatIssues } from './config';
import { ConfigError } from './errors';
import type { Logger } from './logger';

const USAGE = `
stomp-ws - STOMP over WebSocket consumer and publisher

Usage:
  stomp-ws --host <host> --topic <destination> [options]

Options:
  --host <host>          Broker host (e.g. broker.example.com)
  --port <port>          Broker WebSocket port (default: 61614)
  --topic <destination>  Destination, e.g. /topic/your.topic.name
  --username <name>      Login
  --password <secret>    Passcode
  --ssl                  Use wss:// (default: ws://)
  --sockjs               Target a SockJS server's /websocket endpoint
  --send <payload>       Send one message to the topic and exit
  --json                 Convert --send "key1=value1 key2=value2" to JSON
  --heartbeat <seconds>  Heartbeat interval, also proposed in the CONNECT heart-beat
                         header (default: 10, i.e. heart-beat:10000,10000)
  --insecure             Accept self-signed certificates
  --debug                Trace frames
  -h, --help             Show this help
`;

const CliArgsSchema = z.object({
  host: z.string({ required_error: '--host is required' }).min(1),
  port: z.coerce.number().int().min(1).max(65535).default(61614),
  topic: z.string({ required_error: '--topic is required' }).min(1),
  username: z.string().optional(),
  password: z.string().optional(),
  ssl: z.boolean().default(false),
  sockjs: z.boolean().default(false),
  send: z.string().optional(),
  json: z.boolean().default(false),
  heartbeat: z.coerce.number().int().positive().default(10),
  insecure: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type CliOptions = z.output<typeof CliArgsSchema>;

export type ParsedCli = { help: true } | { help: false; options: CliOptions };

export interface CliDeps {
  logger?: Logger;
  createClient?: (options: ClientOptions) => StompClient;
  /** Resolves when the listener should stop */
  waitForShutdown?: (client: StompClient, logger: Logger) => Promise<void>;
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h' },
      host: { type: 'string' },
      port: { type: 'string' },
      topic: { type: 'string' },
      username: { type: 'string' },
      password: { type: 'string' },
      ssl: { type: 'boolean' },
      sockjs: { type: 'boolean' },
      send: { type: 'string' },
      json: { type: 'boolean' },
      heartbeat: { type: 'string' },
      insecure: { type: 'boolean' },
      debug: { type: 'boolean' },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

export function parseCliArgs(argv: string[]): ParsedCli {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error), { cause: error });
  }

  if (values.help) {
    return { help: true };
  }

  const result = CliArgsSchema.safeParse(values);
  if (!result.success) {
    throw new ConfigError(`Invalid arguments: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return { help: false, options: result.data };
}

/**
 * Console logger with "time - LEVEL - message" lines
 */
export function createCliLogger(now: () => Date = () => new Date()): Logger {
  const line = (level: string, message: string): string => `${now().toISOString()} - ${level} - ${message}`;
  return {
    debug: (message, ...args) => console.debug(line('DEBUG', message), ...args),
    info: (message, ...args) => console.log(line('INFO', message), ...args),
    warn: (message, ...args) => console.warn(line('WARNING', message), ...args),
    error: (message, ...args) => console.error(line('ERROR', message), ...args),
  };
}

/**
 * Wait for Ctrl+C, SIGTERM or the broker closing the connection
 */
export function waitForSignal(client: StompClient, logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    const finish = (reason: string): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      client.off('close', onClose);
      logger.info(reason);
      resolve();
    };
    const onSignal = (): void => finish('Shutdown requested by user');
    const onClose = (): void => finish('Connection closed by remote host');

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
    client.on('close', onClose);
  });
}

export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const logger = deps.logger ?? createCliLogger();

  let parsed: ParsedCli;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      console.log(USAGE);
      return 2;
    }
    throw error;
  }

  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  const opts = parsed.options;
  const endpoint = `${opts.host}:${opts.port}`;
  const unverified = opts.insecure && opts.ssl;

  logger.info(
    `Will connect using protocol=${opts.ssl ? 'wss' : 'ws'}, endpoint=${endpoint}, sockjs=${opts.sockjs}` +
      (unverified ? ' (accepting self-signed certificates)' : ''),
  );
  if (unverified) {
    logger.warn('SSL certificate verification is disabled. This is insecure and should only be used for testing!');
  }

  const createClient = deps.createClient ?? ((options: ClientOptions) => new StompClient(options));
  const client = createClient({
    host: endpoint,
    secure: opts.ssl,
    sockjs: opts.sockjs,
    username: opts.username,
    passcode: opts.password,
    insecure: opts.insecure,
    heartbeatIntervalMs: opts.heartbeat * 1000,
    debug: opts.debug,
    logger,
  });

  try {
    logger.info(`Connecting to STOMP server at ${client.url}`);
    if (!(await client.connect())) {
      logger.error('Failed to connect to STOMP server');
      return 1;
    }
    logger.info('Successfully connected to STOMP server');

    if (opts.send !== undefined) {
      return (await sendMessage(client, opts.topic, opts.send, opts.json, logger)) ? 0 : 1;
    }

    listen(client, opts.topic, logger);
    await (deps.waitForShutdown ?? waitForSignal)(client, logger);
    return 0;
  } catch (error) {
    logger.error(`Error occurred: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  } finally {
    await client.disconnect();
    logger.info('Disconnected from STOMP server');
    logger.info('STOMP client shutdown complete');
  }
}

async function sendMessage(
  client: StompClient,
  topic: string,
  input: string,
  asJson: boolean,
  logger: Logger,
): Promise<boolean> {
  const payload = asJson ? formatJsonPayload(input) : input;
  if (asJson) {
    logger.info('Converted input to JSON format');
  }

  if (!(await client.send(topic, payload))) {
    logger.error(`Message to ${topic} was not delivered`);
    return false;
  }
  logger.info(`Message sent to topic: ${topic}`);
  logger.info(`Payload: ${payload}`);
  return true;
}

function listen(client: StompClient, topic: string, logger: Logger): void {
  client.subscribe(topic, (body) => {
    logger.info(`Message received at ${new Date().toISOString()}`);
    logger.info(`Payload: ${formatIncoming(body)}`);
    logger.info('-'.repeat(80));
  });
  logger.info(`Subscribed to topic: ${topic}`);
  logger.info('Consumer started. Waiting for messages... (Press Ctrl+C to stop)');
}

