export type ExternalService = 'chat' | 'balances';

/**
 * Transient failure of a remote collaborator (chat platform or balance sheet).
 * Adapters wrap whatever their SDK throws in this so callers can tell it apart
 * from programming errors.
 */
export class ExternalServiceError extends Error {
  constructor(
    readonly service: ExternalService,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ExternalServiceError';
  }
}

/** A message we hold an id for no longer exists on the chat platform. */
export class ChatMessageNotFoundError extends ExternalServiceError {
  constructor(
    readonly channelId: string,
    readonly messageId: string,
    options?: { cause?: unknown },
  ) {
    super('chat', `Message ${messageId} not found in ${channelId}`, options);
    this.name = 'ChatMessageNotFoundError';
  }
}

/** The winning amount could not be debited; needs manual reconciliation. */
export class SettlementDebitError extends Error {
  constructor(
    readonly threadId: string,
    readonly participantId: string | null,
    readonly amount: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SettlementDebitError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
