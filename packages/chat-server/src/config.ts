import { z } from 'zod'
import type { TokenServiceOptions } from '@relaychat/auth'
import { natsAdapter } from './adapters/nats.js'
import type { ChatServerOptions } from './server.js'

const seconds = z.coerce.number().int().positive()
const millis = z.coerce.number().int().positive()

const envSchema = z.object({
  CHAT_ACCESS_TOKEN_SECRET: z.string().min(16),
  CHAT_REFRESH_TOKEN_SECRET: z.string().min(16),
  CHAT_ACCESS_TOKEN_TTL_SECONDS: seconds.default(1800),
  CHAT_REFRESH_TOKEN_TTL_SECONDS: seconds.default(604_800),
  CHAT_CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().nonnegative().default(5),
  CHAT_WS_PATH: z.string().startsWith('/').default('/_chat'),
  CHAT_HEARTBEAT_INTERVAL_MS: millis.default(15_000),
  CHAT_MISSED_HEARTBEATS: z.coerce.number().int().positive().default(2),
  CHAT_REVALIDATION_INTERVAL_MS: millis.default(30_000),
  CHAT_AUTH_TIMEOUT_MS: millis.default(10_000),
  CHAT_QUEUE_CAPACITY: z.coerce.number().int().positive().default(256),
  CHAT_NATS_URL: z.string().url().optional(),
  CHAT_NATS_SUBJECT: z.string().min(1).default('relaychat.events'),
})

export interface ChatConfig {
  accessTokenSecret: string
  refreshTokenSecret: string
  accessTokenTtlSeconds: number
  refreshTokenTtlSeconds: number
  clockToleranceSeconds: number
  path: string
  heartbeatIntervalMs: number
  missedHeartbeats: number
  revalidationIntervalMs: number
  authTimeoutMs: number
  queueCapacity: number
  /** Unset means single-instance: the in-memory broker. */
  natsUrl: string | undefined
  natsSubject: string
}

/**
 * Read configuration from `CHAT_*` environment variables. Both token secrets
 * are required and must differ; everything else has a default.
 *
 * @throws Error listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ChatConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`[chat] Invalid configuration: ${problems}`)
  }
  const vars = parsed.data
  if (vars.CHAT_ACCESS_TOKEN_SECRET === vars.CHAT_REFRESH_TOKEN_SECRET) {
    throw new Error(
      '[chat] Invalid configuration: CHAT_ACCESS_TOKEN_SECRET and CHAT_REFRESH_TOKEN_SECRET must differ',
    )
  }

  return {
    accessTokenSecret: vars.CHAT_ACCESS_TOKEN_SECRET,
    refreshTokenSecret: vars.CHAT_REFRESH_TOKEN_SECRET,
    accessTokenTtlSeconds: vars.CHAT_ACCESS_TOKEN_TTL_SECONDS,
    refreshTokenTtlSeconds: vars.CHAT_REFRESH_TOKEN_TTL_SECONDS,
    clockToleranceSeconds: vars.CHAT_CLOCK_TOLERANCE_SECONDS,
    path: vars.CHAT_WS_PATH,
    heartbeatIntervalMs: vars.CHAT_HEARTBEAT_INTERVAL_MS,
    missedHeartbeats: vars.CHAT_MISSED_HEARTBEATS,
    revalidationIntervalMs: vars.CHAT_REVALIDATION_INTERVAL_MS,
    authTimeoutMs: vars.CHAT_AUTH_TIMEOUT_MS,
    queueCapacity: vars.CHAT_QUEUE_CAPACITY,
    natsUrl: vars.CHAT_NATS_URL,
    natsSubject: vars.CHAT_NATS_SUBJECT,
  }
}

export function tokenOptionsFromConfig(
  config: ChatConfig,
): Pick<
  TokenServiceOptions,
  'accessSecret' | 'refreshSecret' | 'accessTtlSeconds' | 'refreshTtlSeconds' | 'clockToleranceSeconds'
> {
  return {
    accessSecret: config.accessTokenSecret,
    refreshSecret: config.refreshTokenSecret,
    accessTtlSeconds: config.accessTokenTtlSeconds,
    refreshTtlSeconds: config.refreshTokenTtlSeconds,
    clockToleranceSeconds: config.clockToleranceSeconds,
  }
}

export function serverOptionsFromConfig(
  config: ChatConfig,
): Pick<
  ChatServerOptions,
  | 'path'
  | 'heartbeatIntervalMs'
  | 'missedHeartbeats'
  | 'revalidationIntervalMs'
  | 'authTimeoutMs'
  | 'queueCapacity'
  | 'adapter'
> {
  return {
    path: config.path,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    missedHeartbeats: config.missedHeartbeats,
    revalidationIntervalMs: config.revalidationIntervalMs,
    authTimeoutMs: config.authTimeoutMs,
    queueCapacity: config.queueCapacity,
    adapter: config.natsUrl
      ? natsAdapter({ url: config.natsUrl, subject: config.natsSubject })
      : undefined,
  }
}
