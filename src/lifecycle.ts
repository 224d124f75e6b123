/**
 * Message lifecycle
 *
 *   Unsent → Assembled → InTransit → Received → Decrypted
 *                                         └──→ Rejected
 *
 * The sender drives the first three states; the receiver the rest. Any
 * failure during sealing or opening lands in Rejected. Decrypted and Rejected
 * are terminal, so an envelope can be opened at most once per
 * IncomingMessage.
 */
import type {
  EnvelopeState,
  KeyPair,
  MessageEnvelope,
  OpenOptions,
  OpenedMessage,
  SealpostConfig,
} from "./types";
import { ENVELOPE_STATES } from "./constants";
import { InvalidTransitionError } from "./errors";
import { Logger } from "./logger";
import { openEnvelope, sealEnvelope } from "./envelope";

const VALID_TRANSITIONS: ReadonlyMap<EnvelopeState, readonly EnvelopeState[]> =
  new Map<EnvelopeState, readonly EnvelopeState[]>([
    [ENVELOPE_STATES.UNSENT, [ENVELOPE_STATES.ASSEMBLED, ENVELOPE_STATES.REJECTED]],
    [ENVELOPE_STATES.ASSEMBLED, [ENVELOPE_STATES.IN_TRANSIT]],
    [ENVELOPE_STATES.IN_TRANSIT, [ENVELOPE_STATES.RECEIVED]],
    [ENVELOPE_STATES.RECEIVED, [ENVELOPE_STATES.DECRYPTED, ENVELOPE_STATES.REJECTED]],
    [ENVELOPE_STATES.DECRYPTED, []],
    [ENVELOPE_STATES.REJECTED, []],
  ]);

export function canTransition(from: EnvelopeState, to: EnvelopeState): boolean {
  return (VALID_TRANSITIONS.get(from) ?? []).includes(to);
}

export function assertTransition(from: EnvelopeState, to: EnvelopeState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function isTerminal(state: EnvelopeState): boolean {
  return (VALID_TRANSITIONS.get(state) ?? []).length === 0;
}

abstract class TrackedMessage {
  protected currentState: EnvelopeState;

  protected constructor(initial: EnvelopeState) {
    this.currentState = initial;
  }

  get state(): EnvelopeState {
    return this.currentState;
  }

  protected advance(to: EnvelopeState): void {
    assertTransition(this.currentState, to);
    Logger.log("Lifecycle", `${this.currentState} → ${to}`);
    this.currentState = to;
  }
}

/**
 * Sender side. Seals once, then hands the envelope to transport.
 */
export class OutgoingMessage extends TrackedMessage {
  private envelope: MessageEnvelope | null = null;

  constructor(
    private readonly senderIdentity: KeyPair,
    private readonly receiverPublicKey: Uint8Array,
    private readonly config: SealpostConfig,
  ) {
    super(ENVELOPE_STATES.UNSENT);
  }

  seal(plaintext: string | Uint8Array): MessageEnvelope {
    assertTransition(this.currentState, ENVELOPE_STATES.ASSEMBLED);

    try {
      this.envelope = sealEnvelope(
        {
          plaintext,
          senderIdentity: this.senderIdentity,
          receiverPublicKey: this.receiverPublicKey,
        },
        this.config,
      );
    } catch (error) {
      Logger.error("Lifecycle", "Sealing failed", error);
      this.advance(ENVELOPE_STATES.REJECTED);
      throw error;
    }

    this.advance(ENVELOPE_STATES.ASSEMBLED);
    return this.envelope;
  }

  /**
   * Release the envelope to the transport collaborator.
   */
  dispatch(): MessageEnvelope {
    if (!this.envelope) {
      throw new InvalidTransitionError(this.currentState, ENVELOPE_STATES.IN_TRANSIT);
    }
    this.advance(ENVELOPE_STATES.IN_TRANSIT);
    return this.envelope;
  }
}

/**
 * Receiver side. Created from a delivered envelope and opened exactly once.
 */
export class IncomingMessage extends TrackedMessage {
  private opened: OpenedMessage | null = null;
  private failure: unknown = null;

  constructor(
    readonly envelope: MessageEnvelope,
    private readonly config: SealpostConfig,
  ) {
    super(ENVELOPE_STATES.RECEIVED);
  }

  open(receiverSecretKey: Uint8Array, options: OpenOptions = {}): OpenedMessage {
    assertTransition(this.currentState, ENVELOPE_STATES.DECRYPTED);

    try {
      this.opened = openEnvelope(this.envelope, receiverSecretKey, this.config, options);
    } catch (error) {
      Logger.error("Lifecycle", "Envelope rejected", error);
      this.failure = error;
      this.advance(ENVELOPE_STATES.REJECTED);
      throw error;
    }

    this.advance(ENVELOPE_STATES.DECRYPTED);
    return this.opened;
  }

  get rejection(): unknown {
    return this.failure;
  }
}
