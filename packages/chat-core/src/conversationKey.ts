import type { ConversationId, ConversationTarget, PrincipalId } from './types.js'

/**
 * Resolve a send target to its conversation id.
 *
 * Direct conversations are keyed by the sorted pair of member ids so that
 * both participants address the same conversation regardless of who writes
 * first.
 */
export function conversationIdFor(
  senderId: PrincipalId,
  target: ConversationTarget,
): ConversationId {
  switch (target.kind) {
    case 'direct': {
      // Code-unit order, identical on every instance whatever its locale.
      const [a, b] =
        senderId < target.peerId ? [senderId, target.peerId] : [target.peerId, senderId]
      return `direct:${a}:${b}`
    }
    case 'group':
      return `group:${target.groupId}`
  }
}

export type ParsedConversation =
  | { kind: 'direct'; members: readonly [PrincipalId, PrincipalId] }
  | { kind: 'group'; groupId: string }

/** Inverse of {@link conversationIdFor}. Returns `null` for malformed ids. */
export function parseConversationId(id: ConversationId): ParsedConversation | null {
  const [kind, ...rest] = id.split(':')
  if (kind === 'direct' && rest.length === 2 && rest[0] && rest[1]) {
    return { kind: 'direct', members: [rest[0], rest[1]] }
  }
  if (kind === 'group' && rest.length >= 1) {
    const groupId = rest.join(':')
    return groupId ? { kind: 'group', groupId } : null
  }
  return null
}
