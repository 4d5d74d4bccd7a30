import type { IceCandidatePayload, SessionDescriptionPayload } from "../../protocol/messages.js";
import type { IceServerConfig } from "../config.js";
import type { ClientLogger } from "../logger.js";
import type {
  AudioAnalyser,
  AudioCaptureConstraints,
  MediaPlatform,
  PeerConnectionEvents,
  PeerConnectionHandle,
} from "./types.js";

const ANALYSER_FFT_SIZE = 512;
const ANALYSER_SMOOTHING = 0.1;

function toDescriptionPayload(description: RTCSessionDescriptionInit): SessionDescriptionPayload {
  return { type: description.type ?? "offer", sdp: description.sdp };
}

function toCandidatePayload(candidate: RTCIceCandidate): IceCandidatePayload {
  const json = candidate.toJSON();
  return {
    candidate: json.candidate ?? "",
    sdpMid: json.sdpMid ?? null,
    sdpMLineIndex: json.sdpMLineIndex ?? null,
    usernameFragment: json.usernameFragment ?? null,
  };
}

class BrowserPeerConnection implements PeerConnectionHandle<MediaStream> {
  private readonly pc: RTCPeerConnection;
  private hasLocalTracks = false;

  constructor(iceServers: IceServerConfig[], events: PeerConnectionEvents<MediaStream>) {
    this.pc = new RTCPeerConnection({ iceServers });

    this.pc.onicecandidate = (event) => {
      if (event.candidate) events.onIceCandidate(toCandidatePayload(event.candidate));
    };
    this.pc.ontrack = (event) => {
      const [stream] = event.streams;
      if (stream) events.onRemoteStream(stream);
    };
    this.pc.onconnectionstatechange = () => {
      events.onConnectionStateChange(this.pc.connectionState);
    };
  }

  addLocalStream(stream: MediaStream): void {
    for (const track of stream.getAudioTracks()) {
      this.pc.addTrack(track, stream);
    }
    this.hasLocalTracks = true;
  }

  async createOffer(): Promise<SessionDescriptionPayload> {
    // Without a microphone we still want to hear the other side
    if (!this.hasLocalTracks && this.pc.getTransceivers().length === 0) {
      this.pc.addTransceiver("audio", { direction: "recvonly" });
    }
    const offer = await this.pc.createOffer();
    await this.pc.setLocalDescription(offer);
    return toDescriptionPayload(offer);
  }

  async createAnswer(offer: SessionDescriptionPayload): Promise<SessionDescriptionPayload> {
    await this.pc.setRemoteDescription(offer);
    const answer = await this.pc.createAnswer();
    await this.pc.setLocalDescription(answer);
    return toDescriptionPayload(answer);
  }

  async setRemoteAnswer(answer: SessionDescriptionPayload): Promise<void> {
    await this.pc.setRemoteDescription(answer);
  }

  async addIceCandidate(candidate: IceCandidatePayload): Promise<void> {
    await this.pc.addIceCandidate(candidate);
  }

  close(): void {
    this.pc.onicecandidate = null;
    this.pc.ontrack = null;
    this.pc.onconnectionstatechange = null;
    this.pc.close();
  }
}

function createBrowserAnalyser(stream: MediaStream, logger: ClientLogger): AudioAnalyser {
  const ctx = new AudioContext();
  const source = ctx.createMediaStreamSource(stream);
  const analyser = ctx.createAnalyser();
  analyser.fftSize = ANALYSER_FFT_SIZE;
  analyser.smoothingTimeConstant = ANALYSER_SMOOTHING;
  source.connect(analyser);

  return {
    readFrequencyData: () => {
      const data = new Float32Array(analyser.frequencyBinCount);
      analyser.getFloatFrequencyData(data);
      return data;
    },
    close: () => {
      source.disconnect();
      ctx.close().catch((err: unknown) => {
        logger.warn({ err }, "Failed to close audio context");
      });
    },
  };
}

/**
 * MediaPlatform over navigator.mediaDevices, RTCPeerConnection and the Web
 * Audio API
 */
export function createBrowserMediaPlatform(logger: ClientLogger): MediaPlatform<MediaStream> {
  return {
    getUserMedia: (constraints: AudioCaptureConstraints) =>
      navigator.mediaDevices.getUserMedia(constraints),
    createPeerConnection: (config, events) => new BrowserPeerConnection(config.iceServers, events),
    createAudioAnalyser: (stream) => createBrowserAnalyser(stream, logger),
  };
}
