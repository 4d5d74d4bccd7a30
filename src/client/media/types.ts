/**
 * Media capability ports
 *
 * The browser's capture, peer connection and audio analysis APIs sit behind
 * these interfaces. `S` is the platform's stream type (MediaStream in a
 * browser).
 */
import type { IceCandidatePayload, SessionDescriptionPayload } from "../../protocol/messages.js";
import type { IceServerConfig } from "../config.js";

export interface LocalTrack {
  readonly kind: string;
  enabled: boolean;
  stop(): void;
}

export interface LocalStream {
  getTracks(): LocalTrack[];
  getAudioTracks(): LocalTrack[];
}

export interface AudioCaptureConstraints {
  audio: {
    channelCount: number;
    echoCancellation: boolean;
    noiseSuppression: boolean;
    autoGainControl: boolean;
  };
  video: false;
}

export type PeerConnectionState =
  | "new"
  | "connecting"
  | "connected"
  | "disconnected"
  | "failed"
  | "closed";

export interface PeerConnectionEvents<S> {
  onIceCandidate(candidate: IceCandidatePayload): void;
  onConnectionStateChange(state: PeerConnectionState): void;
  onRemoteStream(stream: S): void;
}

export interface PeerConnectionHandle<S> {
  /** Attach our outgoing tracks; without a stream the link only receives */
  addLocalStream(stream: S): void;
  /** Create an offer and install it as the local description */
  createOffer(): Promise<SessionDescriptionPayload>;
  /** Install a remote offer, then create and install the answer */
  createAnswer(offer: SessionDescriptionPayload): Promise<SessionDescriptionPayload>;
  setRemoteAnswer(answer: SessionDescriptionPayload): Promise<void>;
  addIceCandidate(candidate: IceCandidatePayload): Promise<void>;
  close(): void;
}

export interface AudioAnalyser {
  /** Current frequency spectrum in dB */
  readFrequencyData(): ArrayLike<number>;
  close(): void;
}

export interface MediaPlatform<S extends LocalStream> {
  getUserMedia(constraints: AudioCaptureConstraints): Promise<S>;
  createPeerConnection(
    config: { iceServers: IceServerConfig[] },
    events: PeerConnectionEvents<S>,
  ): PeerConnectionHandle<S>;
  createAudioAnalyser(stream: S): AudioAnalyser;
}

/** Where remote audio is played */
export interface AudioSinks<S> {
  attach(userId: string, stream: S): void;
  detach(userId: string): void;
  detachAll(): void;
}
