import type { ClassroomController } from "../classroom/classroomController.js";
import type { RelayClient } from "../relay/relayClient.js";

/**
 * "E" interacts with whatever is nearby. Typing in a form field is left alone.
 */
export function bindKeyboard(target: EventTarget, controller: ClassroomController): () => void {
  const onKeyDown = (event: Event) => {
    if (!(event instanceof KeyboardEvent) || event.repeat) return;
    if (event.target instanceof HTMLInputElement || event.target instanceof HTMLTextAreaElement) {
      return;
    }
    if (event.key === "e" || event.key === "E") {
      controller.interact();
    }
  };

  target.addEventListener("keydown", onKeyDown);
  return () => target.removeEventListener("keydown", onKeyDown);
}

/**
 * A relay that gave up while the tab was hidden gets another round of
 * attempts when the page is shown again.
 */
export function bindPageVisibility(doc: Document, relay: RelayClient): () => void {
  const onChange = () => {
    if (doc.visibilityState === "visible" && relay.state === "unavailable") {
      relay.retry();
    }
  };

  doc.addEventListener("visibilitychange", onChange);
  return () => doc.removeEventListener("visibilitychange", onChange);
}
