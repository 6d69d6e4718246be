export type ChatErrorCode =
  | 'AuthExpired'
  | 'AuthInvalid'
  | 'AuthRevoked'
  | 'TokenReplay'
  | 'NotAMember'
  | 'ConversationNotFound'
  | 'MessageNotFound'
  | 'PersistenceFailure'
  | 'PublishFailure'
  | 'TransportClosed'
  | 'ProtocolError'

const CODES: ReadonlySet<string> = new Set<ChatErrorCode>([
  'AuthExpired',
  'AuthInvalid',
  'AuthRevoked',
  'TokenReplay',
  'NotAMember',
  'ConversationNotFound',
  'MessageNotFound',
  'PersistenceFailure',
  'PublishFailure',
  'TransportClosed',
  'ProtocolError',
])

/**
 * Every failure the chat core reports carries one of the {@link ChatErrorCode}
 * values so callers (and the wire protocol) can branch on it.
 */
export class ChatError extends Error {
  readonly code: ChatErrorCode

  constructor(code: ChatErrorCode, message: string, options?: { cause?: unknown }) {
    super(`[chat] ${message}`, options)
    this.name = 'ChatError'
    this.code = code
  }
}

export function isChatError(err: unknown, code?: ChatErrorCode): err is ChatError {
  return err instanceof ChatError && (code === undefined || err.code === code)
}

export function isChatErrorCode(value: string): value is ChatErrorCode {
  return CODES.has(value)
}

/** True for the codes that mean the credential itself is no longer usable. */
export function isAuthErrorCode(code: ChatErrorCode): boolean {
  return (
    code === 'AuthExpired' ||
    code === 'AuthInvalid' ||
    code === 'AuthRevoked' ||
    code === 'TokenReplay'
  )
}
