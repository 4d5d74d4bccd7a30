/**
 * Scriptable media platform for peer and voice tests
 */
import { vi } from "vitest";
import type { IceCandidatePayload, SessionDescriptionPayload } from "@src/protocol/messages.js";
import type { IceServerConfig } from "@src/client/config.js";
import type {
  AudioAnalyser,
  AudioCaptureConstraints,
  AudioSinks,
  LocalStream,
  LocalTrack,
  MediaPlatform,
  PeerConnectionEvents,
  PeerConnectionHandle,
  PeerConnectionState,
} from "@src/client/media/types.js";

export class FakeTrack implements LocalTrack {
  readonly kind = "audio";
  enabled = true;
  stopped = false;

  stop(): void {
    this.stopped = true;
  }
}

export class FakeStream implements LocalStream {
  readonly tracks = [new FakeTrack()];

  constructor(readonly label = "local") {}

  getTracks(): FakeTrack[] {
    return this.tracks;
  }

  getAudioTracks(): FakeTrack[] {
    return this.tracks;
  }
}

export class FakeAnalyser implements AudioAnalyser {
  level = -100;
  closed = false;

  readFrequencyData(): number[] {
    return [this.level, this.level, this.level, this.level];
  }

  close(): void {
    this.closed = true;
  }
}

export const OFFER: SessionDescriptionPayload = { type: "offer", sdp: "v=0 offer" };
export const ANSWER: SessionDescriptionPayload = { type: "answer", sdp: "v=0 answer" };

export function candidate(n: number): IceCandidatePayload {
  return { candidate: `candidate:${n} 1 udp 2122260223 192.0.2.1 5000${n} typ host`, sdpMid: "0" };
}

export class FakePeerConnection implements PeerConnectionHandle<FakeStream> {
  readonly localStreams: FakeStream[] = [];
  readonly remoteAnswers: SessionDescriptionPayload[] = [];
  readonly remoteOffers: SessionDescriptionPayload[] = [];
  readonly addedCandidates: IceCandidatePayload[] = [];
  closed = false;
  failNegotiation: Error | null = null;

  constructor(readonly events: PeerConnectionEvents<FakeStream>) {}

  addLocalStream(stream: FakeStream): void {
    this.localStreams.push(stream);
  }

  async createOffer(): Promise<SessionDescriptionPayload> {
    if (this.failNegotiation) throw this.failNegotiation;
    return OFFER;
  }

  async createAnswer(offer: SessionDescriptionPayload): Promise<SessionDescriptionPayload> {
    if (this.failNegotiation) throw this.failNegotiation;
    this.remoteOffers.push(offer);
    return ANSWER;
  }

  async setRemoteAnswer(answer: SessionDescriptionPayload): Promise<void> {
    if (this.failNegotiation) throw this.failNegotiation;
    this.remoteAnswers.push(answer);
  }

  async addIceCandidate(c: IceCandidatePayload): Promise<void> {
    this.addedCandidates.push(c);
  }

  close(): void {
    this.closed = true;
  }

  emitState(state: PeerConnectionState): void {
    this.events.onConnectionStateChange(state);
  }

  emitCandidate(c: IceCandidatePayload): void {
    this.events.onIceCandidate(c);
  }

  emitRemoteStream(stream: FakeStream): void {
    this.events.onRemoteStream(stream);
  }
}

export class FakeMediaPlatform implements MediaPlatform<FakeStream> {
  readonly connections: FakePeerConnection[] = [];
  readonly analysers: FakeAnalyser[] = [];
  readonly stream = new FakeStream();
  captureError: unknown = null;

  readonly getUserMedia = vi.fn(async (_constraints: AudioCaptureConstraints) => {
    if (this.captureError !== null) throw this.captureError;
    return this.stream;
  });

  createPeerConnection(
    _config: { iceServers: IceServerConfig[] },
    events: PeerConnectionEvents<FakeStream>,
  ): FakePeerConnection {
    const connection = new FakePeerConnection(events);
    this.connections.push(connection);
    return connection;
  }

  createAudioAnalyser(_stream: FakeStream): FakeAnalyser {
    const analyser = new FakeAnalyser();
    this.analysers.push(analyser);
    return analyser;
  }

  get lastConnection(): FakePeerConnection {
    const connection = this.connections[this.connections.length - 1];
    if (!connection) throw new Error("No peer connection created");
    return connection;
  }
}

export class FakeSinks implements AudioSinks<FakeStream> {
  readonly playing = new Map<string, FakeStream>();

  attach(userId: string, stream: FakeStream): void {
    this.playing.set(userId, stream);
  }

  detach(userId: string): void {
    this.playing.delete(userId);
  }

  detachAll(): void {
    this.playing.clear();
  }
}

/** DOMException-like error as thrown by getUserMedia */
export function mediaError(name: string): Error {
  const err = new Error(`${name} raised`);
  err.name = name;
  return err;
}
