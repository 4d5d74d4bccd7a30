import type { ClientLogger } from "../logger.js";
import type { AudioSinks } from "./types.js";

export function remoteAudioElementId(userId: string): string {
  return `remote-audio-${userId}`;
}

/**
 * One hidden autoplaying `<audio>` element per remote participant
 */
export function createDomAudioSinks(doc: Document, logger: ClientLogger): AudioSinks<MediaStream> {
  const elements = new Map<string, HTMLAudioElement>();

  const detach = (userId: string) => {
    const element = elements.get(userId);
    if (!element) return;
    element.srcObject = null;
    element.remove();
    elements.delete(userId);
  };

  return {
    attach(userId, stream) {
      let element = elements.get(userId);
      if (!element) {
        element = doc.createElement("audio");
        element.id = remoteAudioElementId(userId);
        element.autoplay = true;
        doc.body.appendChild(element);
        elements.set(userId, element);
      }
      element.srcObject = stream;

      // Autoplay policies may block until the user interacts with the page
      element.play().catch((err: unknown) => {
        logger.warn({ err, userId }, "Remote audio playback blocked");
      });
    },
    detach,
    detachAll() {
      for (const userId of [...elements.keys()]) {
        detach(userId);
      }
    },
  };
}
