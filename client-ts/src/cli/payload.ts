const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.\d*|\.\d+)([eE][+-]?\d+)?$/;

type JsonScalar = string | number;

/**
 * Turn "key1=value1 key2=value2" into a JSON object string. Values that read
 * as integers or decimals become numbers; tokens without "=" are skipped.
 */
export function formatJsonPayload(payload: string): string {
  const result: Record<string, JsonScalar> = {};

  for (const pair of payload.split(/\s+/)) {
    const eq = pair.indexOf('=');
    if (eq === -1) continue;
    result[pair.slice(0, eq)] = toScalar(pair.slice(eq + 1));
  }

  return JSON.stringify(result);
}

function toScalar(value: string): JsonScalar {
  if (value.includes('.')) {
    return DECIMAL.test(value) ? Number(value) : value;
  }
  return INTEGER.test(value) ? Number.parseInt(value, 10) : value;
}

/**
 * Pretty-print a received body when it is JSON, otherwise return it as is
 */
export function formatIncoming(body: string | undefined): string {
  if (body === undefined) return '';
  try {
    const parsed: unknown = JSON.parse(body);
    return JSON.stringify(parsed, null, 2);
  } catch {
    return body;
  }
}
