/**
 * Classroom session
 *
 * Wires one relay client, the classroom controller and the peer media
 * controller for a single room visit.
 */
import { ClassroomController } from "./classroom/classroomController.js";
import type { ClassroomView } from "./classroom/types.js";
import {
  resolveClientOptions,
  type ClassroomClientOptions,
  type ResolvedClientOptions,
} from "./config.js";
import { bindPageVisibility } from "./dom/bindings.js";
import { createClientLogger, type ClientLogger } from "./logger.js";
import { createDomAudioSinks } from "./media/audioSinks.js";
import { createBrowserMediaPlatform } from "./media/browserPlatform.js";
import { PeerMediaController, type VoiceInitResult } from "./media/peerMediaController.js";
import type { AudioSinks, LocalStream, MediaPlatform } from "./media/types.js";
import { RelayClient } from "./relay/relayClient.js";
import { createSocketIoConnector } from "./relay/socketio.connector.js";
import type { RelayConnector } from "./relay/transport.js";

export interface SessionMedia<S extends LocalStream> {
  platform: MediaPlatform<S>;
  sinks: AudioSinks<S>;
}

export interface SessionDependencies<S extends LocalStream> {
  view: ClassroomView;
  media: SessionMedia<S>;
  /** Defaults to socket.io against `relayUrl` */
  connector?: RelayConnector;
  logger?: ClientLogger;
}

export interface ClassroomSession<S extends LocalStream> {
  readonly options: ResolvedClientOptions;
  readonly relay: RelayClient;
  readonly classroom: ClassroomController;
  readonly media: PeerMediaController<S>;
  start(): Promise<VoiceInitResult>;
  toggleMute(): boolean;
  bindPageVisibility(doc: Document): void;
  leave(): void;
}

export function createBrowserMedia(doc: Document, logger: ClientLogger): SessionMedia<MediaStream> {
  return {
    platform: createBrowserMediaPlatform(logger),
    sinks: createDomAudioSinks(doc, logger),
  };
}

export function createClassroomSession<S extends LocalStream>(
  input: ClassroomClientOptions,
  deps: SessionDependencies<S>,
): ClassroomSession<S> {
  const options = resolveClientOptions(input);
  const logger = (deps.logger ?? createClientLogger(options.logLevel)).child({
    roomId: options.roomId,
    userId: options.identity.id,
  });
  const { view } = deps;

  const connector =
    deps.connector ??
    createSocketIoConnector({
      url: options.relayUrl,
      path: options.relayPath,
      roomId: options.roomId,
      token: options.token,
    });

  const relay = new RelayClient(connector, {
    roomId: options.roomId,
    maxReconnectAttempts: options.reconnect.maxAttempts,
    reconnectDelayMs: options.reconnect.delayMs,
    logger,
  });

  const classroom = new ClassroomController({
    relay,
    view,
    self: options.identity,
    layout: options.layout,
    logger,
  });

  const media = new PeerMediaController<S>({
    relay,
    platform: deps.media.platform,
    sinks: deps.media.sinks,
    self: { id: options.identity.id, role: options.identity.role },
    iceServers: options.iceServers,
    startMuted: options.startMuted,
    logger,
    onSpeakingChange: (speaking) => view.renderSpeaking(options.identity.id, speaking),
  });

  const unbinders: (() => void)[] = [];
  let started = false;
  let left = false;

  return {
    options,
    relay,
    classroom,
    media,

    /**
     * Ask for the microphone, then connect. Voice failure is shown, not
     * thrown; the classroom works without it.
     */
    async start(): Promise<VoiceInitResult> {
      if (started) {
        return media.hasLocalStream
          ? { ok: true, muted: media.isMuted }
          : { ok: false, reason: "unavailable" };
      }
      started = true;

      classroom.start();
      view.setVoiceStatus({ kind: "initializing" });

      const voice = await media.initialize();
      if (voice.ok) {
        view.setVoiceStatus({ kind: "active", muted: voice.muted });
      } else {
        view.setVoiceStatus({ kind: "disabled", reason: voice.reason });
        view.notify("Voice chat is unavailable; you can still take a seat.", "warning");
      }

      if (!left) relay.connect();
      return voice;
    },

    toggleMute() {
      const muted = media.toggleMute();
      if (media.hasLocalStream) view.setVoiceStatus({ kind: "active", muted });
      return muted;
    },

    bindPageVisibility(doc: Document) {
      if (left) return;
      unbinders.push(bindPageVisibility(doc, relay));
    },

    /** Idempotent */
    leave() {
      if (left) return;
      left = true;

      for (const unbind of unbinders.splice(0)) {
        unbind();
      }
      classroom.dispose();
      // Closes the relay as well
      media.close();
      logger.info("Left classroom");
    },
  };
}
