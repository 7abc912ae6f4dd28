import { z } from 'zod';
import { ConfigError } from './errors';
import { ACCEPT_VERSIONS } from './protocol/frames';

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 10_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;
export const DEFAULT_PING_INTERVAL_MS = 5_000;

export const ClientConfigSchema = z
  .object({
    /** Broker host, optionally with port and path */
    host: z.string().trim().min(1, 'host is required'),
    secure: z.boolean().default(true),
    sockjs: z.boolean().default(false),
    username: z.string().optional(),
    passcode: z.string().optional(),
    /** Skip TLS certificate verification */
    insecure: z.boolean().default(false),
    heartbeatIntervalMs: z.number().int().positive().default(DEFAULT_HEARTBEAT_INTERVAL_MS),
    /** 0 waits for CONNECTED indefinitely */
    connectTimeoutMs: z.number().int().nonnegative().default(DEFAULT_CONNECT_TIMEOUT_MS),
    pingIntervalMs: z.number().int().nonnegative().default(DEFAULT_PING_INTERVAL_MS),
    acceptVersion: z.string().min(1).default(ACCEPT_VERSIONS),
    debug: z.boolean().default(false),
  })
  .strict();

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = z.output<typeof ClientConfigSchema>;

export function parseClientConfig(input: ClientConfigInput): ClientConfig {
  const result = ClientConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid client options: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
