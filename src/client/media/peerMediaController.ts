/**
 * Peer media controller
 *
 * Owns the local microphone stream and one PeerLink per remote participant.
 * The host offers; everyone else answers. A link that fails is closed and
 * not retried until the peer runs a fresh join/offer cycle. The first
 * snapshot after a relay reconnect is such a cycle for every peer.
 */
import type {
  Participant,
  ParticipantRole,
  ServerMessageMap,
  SessionDescriptionPayload,
} from "../../protocol/messages.js";
import type { VoiceFailureReason } from "../classroom/types.js";
import type { IceServerConfig } from "../config.js";
import type { ClientLogger } from "../logger.js";
import type { RelayClient, RelayStatus } from "../relay/relayClient.js";
import { PeerLink, type PeerLinkListener, type PeerLinkState } from "./peerLink.js";
import type {
  AudioAnalyser,
  AudioCaptureConstraints,
  AudioSinks,
  LocalStream,
  MediaPlatform,
} from "./types.js";
import { VoiceActivityDetector, type VadOptions } from "./voiceActivity.js";

export const AUDIO_CONSTRAINTS: AudioCaptureConstraints = {
  audio: {
    channelCount: 1,
    echoCancellation: true,
    noiseSuppression: true,
    autoGainControl: true,
  },
  video: false,
};

export type VoiceInitResult =
  | { ok: true; muted: boolean }
  | { ok: false; reason: VoiceFailureReason };

interface RemotePeer {
  id: string;
  role?: ParticipantRole;
}

export interface PeerMediaControllerOptions<S extends LocalStream> {
  relay: RelayClient;
  platform: MediaPlatform<S>;
  sinks: AudioSinks<S>;
  self: { id: string; role: ParticipantRole };
  iceServers: IceServerConfig[];
  /** Defaults to muted unless we are the host */
  startMuted?: boolean;
  vad?: Partial<VadOptions>;
  onSpeakingChange?: (speaking: boolean) => void;
  logger: ClientLogger;
}

export function classifyMediaError(err: unknown): VoiceFailureReason {
  const name =
    typeof err === "object" && err !== null && "name" in err && typeof err.name === "string"
      ? err.name
      : "";

  switch (name) {
    case "NotAllowedError":
    case "SecurityError":
      return "permission_denied";
    case "NotFoundError":
    case "OverconstrainedError":
      return "device_not_found";
    default:
      return "unavailable";
  }
}

export class PeerMediaController<S extends LocalStream> {
  private readonly relay: RelayClient;
  private readonly platform: MediaPlatform<S>;
  private readonly sinks: AudioSinks<S>;
  private readonly self: { id: string; role: ParticipantRole };
  private readonly iceServers: IceServerConfig[];
  private readonly logger: ClientLogger;
  private readonly options: PeerMediaControllerOptions<S>;

  private readonly links = new Map<string, PeerLink<S>>();
  /** Remote ids from the latest snapshot and later joins */
  private readonly known = new Set<string>();
  private readonly linkListener: PeerLinkListener<S>;
  private localStream: S | null = null;
  private vad: VoiceActivityDetector | null = null;
  private releaseAnalyser: (() => void) | null = null;
  private muted: boolean;
  private speakingShown = false;
  private readonly disposers: (() => void)[];
  private renegotiateOnSnapshot = false;
  private closed = false;

  constructor(options: PeerMediaControllerOptions<S>) {
    this.options = options;
    this.relay = options.relay;
    this.platform = options.platform;
    this.sinks = options.sinks;
    this.self = options.self;
    this.iceServers = options.iceServers;
    this.logger = options.logger.child({ component: "media" });
    this.muted = options.startMuted ?? options.self.role !== "host";

    this.linkListener = {
      onIceCandidate: (link, candidate) => {
        this.relay.send({ type: "ice-candidate", target_id: link.remoteId, candidate });
      },
      onRemoteStream: (link, stream) => {
        if (this.links.get(link.remoteId) !== link) return;
        this.sinks.attach(link.remoteId, stream);
      },
      onFailed: (link, reason) => this.dropLink(link, reason),
    };

    this.disposers = [
      this.relay.onStatus((status) => this.onRelayStatus(status)),
      this.relay.subscribe({
        participants_list: (m) => this.onSnapshot(m.participants),
        participant_joined: (m) => this.onParticipantJoined(m.participant),
        participant_left: (m) => this.onParticipantLeft(m.user_id),
        offer: (m) => this.onOffer(m),
        answer: (m) => this.onAnswer(m),
        "ice-candidate": (m) => this.onIceCandidate(m),
      }),
    ];
  }

  get isMuted(): boolean {
    return this.muted;
  }

  get hasLocalStream(): boolean {
    return this.localStream !== null;
  }

  get peerCount(): number {
    return this.links.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  linkState(remoteId: string): PeerLinkState | null {
    return this.links.get(remoteId)?.state ?? null;
  }

  /**
   * Ask for the microphone. Failure disables voice for this participant
   * only; links are still created so remote audio can be heard.
   */
  async initialize(): Promise<VoiceInitResult> {
    if (this.closed) return { ok: false, reason: "unavailable" };
    if (this.localStream) return { ok: true, muted: this.muted };

    let stream: S;
    try {
      stream = await this.platform.getUserMedia(AUDIO_CONSTRAINTS);
    } catch (err) {
      const reason = classifyMediaError(err);
      this.logger.warn({ err, reason }, "Microphone unavailable, voice disabled");
      return { ok: false, reason };
    }

    // Closed while the permission prompt was open
    if (this.closed) {
      stopTracks(stream);
      return { ok: false, reason: "unavailable" };
    }

    this.localStream = stream;
    this.applyMute();

    for (const link of this.links.values()) {
      // Existing links were negotiated receive-only; they pick the stream up
      // on their next offer/answer cycle.
      link.attachLocalStream(stream);
    }

    this.startVoiceActivity(stream);
    this.logger.info({ muted: this.muted }, "Microphone ready");
    return { ok: true, muted: this.muted };
  }

  /**
   * Enable or disable the outgoing tracks. Links stay up and incoming
   * audio is untouched.
   */
  setMuted(muted: boolean): void {
    if (this.muted === muted) return;
    this.muted = muted;
    this.applyMute();
    this.showSpeaking(!muted && (this.vad?.isSpeaking ?? false));
  }

  toggleMute(): boolean {
    this.setMuted(!this.muted);
    return this.muted;
  }

  /**
   * Stop the VAD, close every link, release the microphone and close the
   * relay. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const dispose of this.disposers.splice(0)) {
      dispose();
    }

    this.vad?.stop();
    this.vad = null;
    this.releaseAnalyser?.();
    this.releaseAnalyser = null;

    for (const link of this.links.values()) {
      link.close();
    }
    this.links.clear();
    this.known.clear();
    this.sinks.detachAll();

    if (this.localStream) {
      stopTracks(this.localStream);
      this.localStream = null;
    }

    this.relay.close();
    this.logger.info("Media controller closed");
  }

  // ─── Relay events ───────────────────────────────────────────

  private onRelayStatus(status: RelayStatus): void {
    // Peers may have dropped their side of every link while we were away
    if (status === "reconnecting" || status === "unavailable") {
      this.renegotiateOnSnapshot = true;
    }
  }

  private onSnapshot(participants: readonly Participant[]): void {
    const present = new Set(participants.map((p) => p.id));
    present.delete(this.self.id);
    this.known.clear();
    for (const remoteId of present) this.known.add(remoteId);

    const renegotiate = this.renegotiateOnSnapshot;
    this.renegotiateOnSnapshot = false;

    for (const [remoteId, link] of [...this.links]) {
      // A link still waiting for its first offer can carry on
      if (!present.has(remoteId) || (renegotiate && link.state !== "new")) {
        this.removePeer(remoteId);
      }
    }

    for (const participant of participants) {
      if (participant.id !== this.self.id && !this.links.has(participant.id)) {
        this.addPeer(participant);
      }
    }
  }

  private onParticipantJoined(participant: Participant): void {
    if (participant.id === this.self.id) return;
    this.known.add(participant.id);

    // A rejoin replaces whatever link we had with that peer
    if (this.links.has(participant.id)) this.removePeer(participant.id);
    this.addPeer(participant);
  }

  private onParticipantLeft(userId: string): void {
    this.known.delete(userId);
    this.removePeer(userId);
  }

  private async onOffer(message: ServerMessageMap["offer"]): Promise<void> {
    const remoteId = message.sender_id;
    let link = this.links.get(remoteId);

    // A new offer on a link that was already negotiated is a fresh cycle
    if (link && link.state !== "new") {
      this.removePeer(remoteId);
      link = undefined;
    }
    link ??= this.createLink({ id: remoteId });

    await this.negotiate(link, async (current) => {
      const answer = await current.acceptOffer(message.description);
      this.relay.send({ type: "answer", target_id: remoteId, description: answer });
    });
  }

  private async onAnswer(message: ServerMessageMap["answer"]): Promise<void> {
    const link = this.links.get(message.sender_id);
    if (!link) {
      this.logger.debug({ remoteId: message.sender_id }, "Answer for unknown link ignored");
      return;
    }
    await this.negotiate(link, (current) => current.acceptAnswer(message.description));
  }

  private async onIceCandidate(message: ServerMessageMap["ice-candidate"]): Promise<void> {
    const remoteId = message.sender_id;
    let link = this.links.get(remoteId);
    if (!link) {
      if (!this.known.has(remoteId)) {
        this.logger.debug({ remoteId }, "Candidate from unknown peer dropped");
        return;
      }
      link = this.createLink({ id: remoteId });
    }
    await this.negotiate(link, (current) => current.addRemoteCandidate(message.candidate));
  }

  // ─── Links ──────────────────────────────────────────────────

  private shouldOffer(remote: RemotePeer): boolean {
    if (this.self.role !== "host") return false;
    // Two hosts: the lower id offers
    return remote.role !== "host" || this.self.id < remote.id;
  }

  private addPeer(remote: RemotePeer): void {
    const link = this.createLink(remote);
    if (!this.shouldOffer(remote)) return;

    void this.negotiate(link, async (current) => {
      const offer: SessionDescriptionPayload = await current.createOffer();
      this.relay.send({ type: "offer", target_id: remote.id, description: offer });
    });
  }

  private createLink(remote: RemotePeer): PeerLink<S> {
    const link = new PeerLink<S>(
      remote.id,
      (events) => this.platform.createPeerConnection({ iceServers: this.iceServers }, events),
      this.linkListener,
    );
    if (this.localStream) link.attachLocalStream(this.localStream);
    this.links.set(remote.id, link);
    this.logger.debug({ remoteId: remote.id }, "Peer link created");
    return link;
  }

  /**
   * Run one negotiation step; a rejection fails only this link
   */
  private async negotiate(
    link: PeerLink<S>,
    step: (link: PeerLink<S>) => Promise<void>,
  ): Promise<void> {
    try {
      await step(link);
    } catch (err) {
      this.dropLink(link, err instanceof Error ? err.message : "negotiation failed");
    }
  }

  private dropLink(link: PeerLink<S>, reason: string): void {
    this.logger.warn({ remoteId: link.remoteId, reason }, "Peer link failed, closing");
    link.close();
    if (this.links.get(link.remoteId) === link) {
      this.links.delete(link.remoteId);
      this.sinks.detach(link.remoteId);
    }
  }

  private removePeer(remoteId: string): void {
    const link = this.links.get(remoteId);
    if (!link) return;

    link.close();
    this.links.delete(remoteId);
    this.sinks.detach(remoteId);
    this.logger.debug({ remoteId }, "Peer link closed");
  }

  // ─── Local audio ────────────────────────────────────────────

  private applyMute(): void {
    if (!this.localStream) return;
    for (const track of this.localStream.getAudioTracks()) {
      track.enabled = !this.muted;
    }
  }

  private startVoiceActivity(stream: S): void {
    let analyser: AudioAnalyser;
    try {
      analyser = this.platform.createAudioAnalyser(stream);
    } catch (err) {
      this.logger.warn({ err }, "Audio analysis unavailable, speaking indicator disabled");
      return;
    }

    this.releaseAnalyser = () => analyser.close();
    this.vad = new VoiceActivityDetector(
      analyser,
      {
        onSpeakingStart: () => this.showSpeaking(!this.muted),
        onSpeakingEnd: () => this.showSpeaking(false),
      },
      this.options.vad,
    );
    this.vad.start();
  }

  private showSpeaking(speaking: boolean): void {
    if (this.speakingShown === speaking) return;
    this.speakingShown = speaking;
    this.options.onSpeakingChange?.(speaking);
  }
}

function stopTracks(stream: LocalStream): void {
  for (const track of stream.getTracks()) {
    track.stop();
  }
}
