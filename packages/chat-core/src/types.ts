/** Stable identifier of an authenticated user. */
export type PrincipalId = string

/**
 * An authenticated identity. Loaded from the principal directory at
 * authentication and refreshed on token rotation.
 */
export interface Principal {
  readonly id: PrincipalId
  readonly displayName: string
  /** Group ids this principal belongs to. */
  readonly groups: ReadonlyArray<string>
}

/**
 * `direct:<a>:<b>` (member ids sorted) or `group:<groupId>`.
 * Build with {@link conversationIdFor}.
 */
export type ConversationId = string

/** Where a client wants a message to go. */
export type ConversationTarget =
  | { kind: 'direct'; peerId: PrincipalId }
  | { kind: 'group'; groupId: string }

// ---------------------------------------------------------------------------
// Fan-out units
// ---------------------------------------------------------------------------

export type DeliveryKind = 'created' | 'edited' | 'deleted'

/**
 * The unit of real-time fan-out. Only ever built after the change it
 * describes has been persisted, and never mutated afterwards.
 */
export interface DeliveryEvent {
  /** Unique per published event. Duplicate suppression keys on this. */
  readonly eventId: string
  readonly kind: DeliveryKind
  readonly messageId: string
  readonly conversationId: ConversationId
  readonly senderId: PrincipalId
  /**
   * Assigned by storage at persistence time; strictly increasing within a
   * conversation. Clients order by this, never by arrival.
   */
  readonly sequence: number
  /** `null` for `deleted` events. */
  readonly payload: string | null
  readonly recipients: ReadonlyArray<PrincipalId>
  /** Millisecond timestamp of persistence. */
  readonly persistedAt: number
}

/** A member has read everything in a conversation up to `sequence`. */
export interface ReadReceipt {
  readonly eventId: string
  readonly conversationId: ConversationId
  readonly readerId: PrincipalId
  readonly sequence: number
  readonly recipients: ReadonlyArray<PrincipalId>
  readonly readAt: number
}

/** How many messages one member has not read yet. */
export interface UnreadCount {
  readonly principalId: PrincipalId
  readonly count: number
}

/** Unread counts of some members of a conversation after a change. */
export interface UnreadUpdate {
  readonly eventId: string
  readonly conversationId: ConversationId
  readonly counts: ReadonlyArray<UnreadCount>
}

/** What the token service can revoke. */
export type RevocationSubject =
  | { kind: 'principal'; principalId: PrincipalId }
  | { kind: 'chain'; chainId: string }
  | { kind: 'token'; tokenId: string }

/** Payloads carried between backend processes by the broker. */
export type BrokerEnvelope =
  | { type: 'delivery'; event: DeliveryEvent }
  | { type: 'receipt'; receipt: ReadReceipt }
  | { type: 'unread'; update: UnreadUpdate }
  | { type: 'revocation'; subject: RevocationSubject }

// ---------------------------------------------------------------------------
// Storage collaborator
// ---------------------------------------------------------------------------

/** Result of a successful write to the message store. */
export interface PersistedChange {
  readonly messageId: string
  readonly conversationId: ConversationId
  readonly sequence: number
  readonly persistedAt: number
}

/** A read marker before and after a `markRead` call. */
export interface ReadMarkerChange {
  readonly previous: number
  /** The stored marker; equal to `previous` when nothing moved. */
  readonly sequence: number
}

/**
 * Durable message storage. Implementations own idempotent-write guarantees;
 * the router never retries a failed write.
 */
export interface MessageStore {
  /** Member ids of a conversation, or `null` when it does not exist. */
  membersOf(conversationId: ConversationId): Promise<ReadonlySet<PrincipalId> | null>
  persistMessage(
    conversationId: ConversationId,
    senderId: PrincipalId,
    payload: string,
  ): Promise<PersistedChange>
  /**
   * Replace the payload of a message authored by `editorId`.
   * Throws `MessageNotFound` when no such message exists for that author.
   */
  editMessage(
    messageId: string,
    editorId: PrincipalId,
    payload: string,
  ): Promise<PersistedChange>
  /** Soft-delete a message authored by `deleterId`. */
  deleteMessage(messageId: string, deleterId: PrincipalId): Promise<PersistedChange>
  /**
   * Record that `readerId` has read up to `sequence`. The stored marker never
   * moves backwards and never passes the conversation's latest sequence.
   */
  markRead(
    conversationId: ConversationId,
    readerId: PrincipalId,
    sequence: number,
  ): Promise<ReadMarkerChange>
  /** Messages by other members, not deleted, past the reader's marker. */
  unreadCount(conversationId: ConversationId, principalId: PrincipalId): Promise<number>
}

/** Read side of the user/group store used at authentication. */
export interface PrincipalDirectory {
  loadPrincipal(id: PrincipalId): Promise<Principal | null>
}
