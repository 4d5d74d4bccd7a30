import type { Interactable } from "../classroom/interaction.js";
import type {
  ClassroomView,
  ConnectionIndicator,
  LocalSeatState,
  NotificationLevel,
  Occupant,
  RoundView,
  SeatLabel,
  SharedContent,
  VoiceStatus,
} from "../classroom/types.js";

export const INTERACT_EVENT = "classroom:interact";
const NOTIFICATION_MS = 3000;
const SHARED_CONTENT_LIMIT = 20;

const VOICE_FAILURE_TEXT = {
  permission_denied: "Microphone permission denied",
  device_not_found: "No microphone found",
  unavailable: "Voice unavailable",
} as const;

export interface DomClassroomView extends ClassroomView {
  dispose(): void;
}

function formatRemaining(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  return `${minutes}:${String(seconds % 60).padStart(2, "0")}`;
}

function roundText(round: RoundView): string {
  switch (round.status) {
    case "waiting":
      return "Update round starting";
    case "active": {
      const speaker = round.currentDisplayName ?? "Next speaker";
      return `${speaker} is giving an update (${formatRemaining(round.timeRemainingSeconds)} left)`;
    }
    case "ended":
      return "Update round finished";
  }
}

/**
 * ClassroomView over the classroom page markup:
 * `[data-seat-id]` seats, `#occupant-list`, `#connection-status`,
 * `#interaction-prompt`, `#voice-status`, `#notification`, `#shared-content`
 * and `#update-round`.
 */
export function createDomClassroomView(root: ParentNode & Node): DomClassroomView {
  const doc = root.ownerDocument ?? (root instanceof Document ? root : null);
  if (!doc) throw new Error("Classroom view root is not attached to a document");

  const byId = (id: string): HTMLElement | null => root.querySelector<HTMLElement>(`#${id}`);
  const seatElement = (seatId: string) =>
    root.querySelector<HTMLElement>(`[data-seat-id="${seatId}"]`);
  const occupantElement = (userId: string): HTMLElement | null => {
    for (const item of root.querySelectorAll<HTMLElement>("#occupant-list [data-occupant-id]")) {
      if (item.dataset.occupantId === userId) return item;
    }
    return null;
  };

  let notificationTimer: ReturnType<typeof setTimeout> | null = null;

  return {
    renderSeat(seatId: string, label: SeatLabel | null) {
      const seat = seatElement(seatId);
      if (!seat) return;

      seat.classList.toggle("occupied", label !== null);
      seat.classList.toggle("self", label?.isSelf ?? false);
      seat.classList.toggle("pending", label?.pending ?? false);
      seat.textContent = label?.displayName ?? "";
      if (label) {
        seat.dataset.occupantId = label.userId;
      } else {
        delete seat.dataset.occupantId;
      }
    },

    renderOccupants(occupants: readonly Occupant[], selfId: string) {
      const list = byId("occupant-list");
      if (!list) return;

      const items = occupants.map((occupant) => {
        const item = doc.createElement("li");
        item.dataset.occupantId = occupant.id;
        item.classList.toggle("offline", !occupant.connected);
        item.textContent =
          occupant.id === selfId ? `${occupant.displayName} (You)` : occupant.displayName;
        return item;
      });
      list.replaceChildren(...items);
    },

    renderLocalState(state: LocalSeatState) {
      doc.body.classList.toggle("seated", state.kind === "seated");
    },

    renderHand(userId: string, raised: boolean) {
      occupantElement(userId)?.classList.toggle("hand-raised", raised);
    },

    renderSpeaking(userId: string, speaking: boolean) {
      occupantElement(userId)?.classList.toggle("speaking", speaking);
    },

    notify(message: string, level: NotificationLevel) {
      const box = byId("notification");
      if (!box) return;

      box.textContent = message;
      box.dataset.level = level;
      box.hidden = false;

      if (notificationTimer) clearTimeout(notificationTimer);
      notificationTimer = setTimeout(() => {
        notificationTimer = null;
        box.hidden = true;
      }, NOTIFICATION_MS);
    },

    setConnectionStatus(status: ConnectionIndicator) {
      const indicator = byId("connection-status");
      if (indicator) indicator.dataset.status = status;
    },

    setNearbyInteractable(target: Interactable | null) {
      const prompt = byId("interaction-prompt");
      if (!prompt) return;

      prompt.hidden = target === null;
      prompt.textContent = target ? `Press E to interact with ${target.label}` : "";
    },

    openInteractable(target: Interactable) {
      root.dispatchEvent(
        new CustomEvent<Interactable>(INTERACT_EVENT, { detail: target, bubbles: true }),
      );
    },

    setVoiceStatus(status: VoiceStatus) {
      const element = byId("voice-status");
      if (!element) return;

      element.dataset.status = status.kind;
      switch (status.kind) {
        case "initializing":
          element.textContent = "Starting microphone...";
          break;
        case "active":
          element.textContent = status.muted ? "Microphone muted" : "Microphone on";
          break;
        case "disabled":
          element.textContent = VOICE_FAILURE_TEXT[status.reason];
          break;
      }
    },

    showSharedContent(content: SharedContent) {
      const list = byId("shared-content");
      if (!list) return;

      const link = doc.createElement("a");
      link.href = content.url;
      link.target = "_blank";
      link.rel = "noopener noreferrer";
      link.textContent = content.description || content.url;

      const item = doc.createElement("li");
      item.dataset.occupantId = content.userId;
      item.dataset.contentType = content.contentType;
      item.append(`${content.isSelf ? "You" : content.displayName}: `, link);

      list.prepend(item);
      while (list.children.length > SHARED_CONTENT_LIMIT) {
        list.lastElementChild?.remove();
      }
    },

    renderRound(round: RoundView) {
      const banner = byId("update-round");
      if (banner) {
        banner.dataset.status = round.status;
        banner.textContent = roundText(round);
      }

      const completed = new Set(round.completedUserIds);
      for (const item of root.querySelectorAll<HTMLElement>("#occupant-list [data-occupant-id]")) {
        const userId = item.dataset.occupantId ?? "";
        const speaking = round.status === "active" && userId === round.currentUserId;
        item.classList.toggle("round-speaker", speaking);
        item.classList.toggle("round-done", round.status !== "waiting" && completed.has(userId));
      }
    },

    dispose() {
      if (notificationTimer) {
        clearTimeout(notificationTimer);
        notificationTimer = null;
      }
    },
  };
}
