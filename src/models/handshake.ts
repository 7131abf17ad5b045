/**
 * Handshake state model.
 */

export type HandshakePhase =
  | 'idle'
  | 'awaitingInitiateAck'
  | 'awaitingAcknowledgeAck'
  | 'awaitingConnected'
  | 'ready'
  | 'failed';

/**
 * Phases in which the coordinator waits on a device response.
 */
export type AwaitingPhase = Extract<
  HandshakePhase,
  'awaitingInitiateAck' | 'awaitingAcknowledgeAck' | 'awaitingConnected'
>;

export type HandshakeFailureReason = 'timeout' | 'disconnected' | 'write-failed';

export type HandshakeState =
  | { phase: 'idle' }
  | { phase: AwaitingPhase }
  | { phase: 'ready' }
  | {
      phase: 'failed';
      reason: HandshakeFailureReason;
      /** Phase the handshake was in when it failed */
      failedIn: AwaitingPhase;
    };

export type HandshakeStateListener = (state: HandshakeState) => void;

export const IDLE_STATE: Readonly<HandshakeState> = { phase: 'idle' };
