import { AudioFrame, TranscriptEvent } from '../../types';

export interface TranscriptionChannel {
  /** Rejects with SendError once the connection is gone. */
  send(frame: AudioFrame): Promise<void>;
  /**
   * Ordered transcript updates. Ends when the peer closes, reports end-of-stream,
   * or the channel is closed locally. Single consumer.
   */
  events(): AsyncIterable<TranscriptEvent>;
  /** Tells the peer no more audio follows; the channel stays open for reading. */
  signalEndOfAudio(): Promise<void>;
  close(): Promise<void>;
}

export interface TranscriptionConnector {
  /** Rejects with ConnectError when the peer is unreachable or refuses the handshake. */
  connect(endpoint: string): Promise<TranscriptionChannel>;
}
