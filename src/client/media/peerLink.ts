import type { IceCandidatePayload, SessionDescriptionPayload } from "../../protocol/messages.js";
import type { PeerConnectionEvents, PeerConnectionHandle, PeerConnectionState } from "./types.js";

export type PeerLinkState = "new" | "negotiating" | "connected" | "failed" | "closed";

export interface PeerLinkListener<S> {
  onIceCandidate(link: PeerLink<S>, candidate: IceCandidatePayload): void;
  onRemoteStream(link: PeerLink<S>, stream: S): void;
  onFailed(link: PeerLink<S>, reason: string): void;
}

/**
 * Media link to one remote participant.
 *
 * Remote candidates that arrive before the remote description are held
 * and applied once it is set.
 */
export class PeerLink<S> {
  private linkState: PeerLinkState = "new";
  private readonly handle: PeerConnectionHandle<S>;
  private remoteDescriptionSet = false;
  private pendingCandidates: IceCandidatePayload[] = [];
  private remote: S | null = null;
  private local: S | null = null;

  constructor(
    readonly remoteId: string,
    open: (events: PeerConnectionEvents<S>) => PeerConnectionHandle<S>,
    private readonly listener: PeerLinkListener<S>,
  ) {
    this.handle = open({
      onIceCandidate: (candidate) => {
        if (this.linkState === "closed") return;
        this.listener.onIceCandidate(this, candidate);
      },
      onRemoteStream: (stream) => {
        if (this.linkState === "closed") return;
        this.remote = stream;
        this.listener.onRemoteStream(this, stream);
      },
      onConnectionStateChange: (state) => this.onConnectionState(state),
    });
  }

  get state(): PeerLinkState {
    return this.linkState;
  }

  get remoteStream(): S | null {
    return this.remote;
  }

  get localStream(): S | null {
    return this.local;
  }

  attachLocalStream(stream: S): void {
    this.local = stream;
    this.handle.addLocalStream(stream);
  }

  async createOffer(): Promise<SessionDescriptionPayload> {
    this.linkState = "negotiating";
    return this.handle.createOffer();
  }

  async acceptOffer(offer: SessionDescriptionPayload): Promise<SessionDescriptionPayload> {
    this.linkState = "negotiating";
    const answer = await this.handle.createAnswer(offer);
    await this.remoteDescriptionReady();
    return answer;
  }

  async acceptAnswer(answer: SessionDescriptionPayload): Promise<void> {
    await this.handle.setRemoteAnswer(answer);
    await this.remoteDescriptionReady();
  }

  async addRemoteCandidate(candidate: IceCandidatePayload): Promise<void> {
    if (this.linkState === "closed") return;
    if (!this.remoteDescriptionSet) {
      this.pendingCandidates.push(candidate);
      return;
    }
    await this.handle.addIceCandidate(candidate);
  }

  /** Idempotent */
  close(): void {
    if (this.linkState === "closed") return;
    this.linkState = "closed";
    this.pendingCandidates = [];
    this.remote = null;
    this.local = null;
    this.handle.close();
  }

  private async remoteDescriptionReady(): Promise<void> {
    this.remoteDescriptionSet = true;
    const queued = this.pendingCandidates;
    this.pendingCandidates = [];
    for (const candidate of queued) {
      if (this.linkState === "closed") return;
      await this.handle.addIceCandidate(candidate);
    }
  }

  private onConnectionState(state: PeerConnectionState): void {
    if (this.linkState === "closed") return;

    if (state === "connected") {
      this.linkState = "connected";
    } else if (state === "failed") {
      this.linkState = "failed";
      this.listener.onFailed(this, "connection failed");
    }
  }
}
