import type { ServerMessageMap, SharedContentType } from "../../protocol/messages.js";
import type { SeatLayout } from "../../protocol/seats.js";
import type { ClientLogger } from "../logger.js";
import type { RelayClient, RelayStatus } from "../relay/relayClient.js";
import { findNearestInteractable, type Interactable } from "./interaction.js";
import {
  SeatReconciler,
  type ReconcileChange,
  type SeatClaimResult,
  type SelfIdentity,
} from "./seatReconciler.js";
import type { ClassroomView, ConnectionIndicator, LocalSeatState, RoundState } from "./types.js";

export const SEAT_TAKEN_MESSAGE = "This seat is already taken by another student.";
export const STAND_UP_FIRST_MESSAGE = "Stand up first to interact with other elements";

const INDICATORS: Record<RelayStatus, ConnectionIndicator | null> = {
  idle: null,
  connecting: "connecting",
  open: "connected",
  reconnecting: "reconnecting",
  unavailable: "disconnected",
  closed: "disconnected",
};

export interface ClassroomControllerOptions {
  relay: RelayClient;
  view: ClassroomView;
  self: SelfIdentity;
  layout: SeatLayout;
  logger: ClientLogger;
}

/**
 * Classroom client controller: local interaction state, rendering and
 * reconciliation with the relay. Owns the occupancy map; nothing else
 * mutates it.
 */
export class ClassroomController {
  private readonly relay: RelayClient;
  private readonly view: ClassroomView;
  private readonly logger: ClientLogger;
  private readonly reconciler: SeatReconciler;
  private readonly self: SelfIdentity;

  private interactables: readonly Interactable[] = [];
  private nearby: Interactable | null = null;
  private handRaised = false;
  private readonly disposers: (() => void)[] = [];
  private started = false;

  constructor(options: ClassroomControllerOptions) {
    this.relay = options.relay;
    this.view = options.view;
    this.logger = options.logger.child({ component: "classroom" });
    this.self = options.self;
    this.reconciler = new SeatReconciler(options.self, options.layout);
  }

  get localState(): LocalSeatState {
    return this.reconciler.localState;
  }

  get state(): SeatReconciler {
    return this.reconciler;
  }

  get nearbyInteractable(): Interactable | null {
    return this.nearby;
  }

  start(): void {
    if (this.started) return;
    this.started = true;

    this.disposers.push(
      this.relay.onStatus((status) => this.onRelayStatus(status)),
      this.relay.subscribe({
        connection_established: (m) => {
          this.logger.debug({ roomId: m.room_id }, "Relay session established");
        },
        participants_list: (m) => this.onSnapshot(m),
        participant_joined: (m) => {
          this.apply(this.reconciler.applyParticipantJoined(m.participant));
        },
        participant_left: (m) => {
          this.view.renderHand(m.user_id, false);
          this.apply(this.reconciler.applyParticipantLeft(m.user_id));
        },
        seat_updated: (m) => {
          this.apply(this.reconciler.applySeatUpdated(m.seat_id, m.user));
        },
        seat_left: (m) => {
          this.apply(this.reconciler.applySeatLeft(m.seat_id, m.user_id));
        },
        seat_occupied: (m) => {
          this.apply(this.reconciler.applySeatOccupied(m.seat_id, m.occupant_id ?? null), m.message);
        },
        hand_raised: (m) => {
          this.view.renderHand(m.user_id, m.raised);
        },
        content_shared: (m) => {
          this.view.showSharedContent({
            userId: m.user_id,
            displayName: m.display_name,
            isSelf: m.user_id === this.self.id,
            contentType: m.content_type,
            url: m.content_url,
            description: m.description,
          });
        },
        round_updated: (m) => this.onRoundUpdated(m),
        error: (m) => {
          this.logger.warn({ message: m.message }, "Relay reported an error");
          this.view.notify(m.message, "error");
        },
      }),
    );

    this.onRelayStatus(this.relay.state);
  }

  dispose(): void {
    for (const dispose of this.disposers.splice(0)) {
      dispose();
    }
  }

  // ─── Local intents ──────────────────────────────────────────

  claimSeat(seatId: string): SeatClaimResult {
    const result = this.reconciler.claim(seatId);
    if (!result.ok) {
      this.logger.debug({ seatId, reason: result.reason }, "Seat claim refused locally");
      return result;
    }

    this.apply(result.change);
    this.relay.send({ type: "update_seat", seat_id: seatId });
    return result;
  }

  standUp(): boolean {
    const result = this.reconciler.standUp();
    if (!result.ok) return false;

    this.apply(result.change);
    this.relay.send({ type: "leave_seat", seat_id: result.seatId });
    return true;
  }

  /**
   * The "E" key: sit on or leave the nearby seat, or use the nearby object
   */
  interact(): void {
    const target = this.nearby;
    if (!target) return;

    const local = this.reconciler.localState;

    if (target.kind === "seat") {
      if (local.kind === "seated" && local.seatId === target.id) {
        this.standUp();
        return;
      }

      const result = this.claimSeat(target.id);
      if (!result.ok && result.reason === "occupied") {
        this.view.notify(SEAT_TAKEN_MESSAGE, "warning");
      } else if (!result.ok && result.reason === "already_seated") {
        this.view.notify(STAND_UP_FIRST_MESSAGE, "info");
      }
      return;
    }

    if (local.kind === "seated") {
      this.view.notify(STAND_UP_FIRST_MESSAGE, "info");
      return;
    }
    this.view.openInteractable(target);
  }

  setInteractables(items: readonly Interactable[]): void {
    this.interactables = items;
  }

  /**
   * Player moved; seated players do not move
   */
  updatePosition(x: number, y: number): boolean {
    if (this.reconciler.localState.kind === "seated") return false;

    const nearest = findNearestInteractable(x, y, this.interactables);
    if (nearest?.id !== this.nearby?.id) {
      this.nearby = nearest;
      this.view.setNearbyInteractable(nearest);
    }
    return true;
  }

  raiseHand(raised: boolean = !this.handRaised): boolean {
    const sent = this.relay.send({ type: "hand_raise", raised });
    if (sent) this.handRaised = raised;
    return sent;
  }

  shareContent(contentType: SharedContentType, url: string, description?: string): boolean {
    return this.relay.send({
      type: "shared_content",
      content_type: contentType,
      content_url: url,
      description,
    });
  }

  /**
   * Host only; the relay broadcasts the round back to everyone, us included
   */
  updateRound(round: RoundState): boolean {
    if (this.self.role !== "host") return false;

    return this.relay.send({
      type: "update_round",
      status: round.status,
      current_user_id: round.currentUserId,
      time_remaining: round.timeRemainingSeconds,
      completed_user_ids: [...round.completedUserIds],
    });
  }

  // ─── Relay ──────────────────────────────────────────────────

  private onRelayStatus(status: RelayStatus): void {
    const indicator = INDICATORS[status];
    if (indicator) this.view.setConnectionStatus(indicator);

    if (status === "open") {
      // Every (re)connect asks for a fresh snapshot
      this.relay.send({ type: "join" });
    } else if (status === "reconnecting" || status === "unavailable") {
      this.apply(this.reconciler.setRemoteConnected(false));
    }
  }

  private onRoundUpdated(message: ServerMessageMap["round_updated"]): void {
    const current = message.current_user_id;
    this.view.renderRound({
      status: message.status,
      currentUserId: current,
      currentDisplayName:
        current === null ? null : (this.reconciler.occupant(current)?.displayName ?? null),
      timeRemainingSeconds: message.time_remaining,
      completedUserIds: message.completed_user_ids,
    });
  }

  private onSnapshot(message: ServerMessageMap["participants_list"]): void {
    const { change, pendingClaim } = this.reconciler.applySnapshot(message.participants);
    this.apply(change);

    if (pendingClaim !== null) {
      this.logger.debug({ seatId: pendingClaim }, "Re-sending unconfirmed seat claim");
      this.relay.send({ type: "update_seat", seat_id: pendingClaim });
    }
  }

  private apply(change: ReconcileChange, rejection?: string): void {
    for (const seatId of change.changedSeats) {
      this.view.renderSeat(seatId, this.reconciler.labelFor(seatId));
    }
    if (change.membershipChanged || change.changedSeats.length > 0) {
      this.view.renderOccupants(this.reconciler.listOccupants(), this.reconciler.selfId);
    }
    if (change.localChanged) {
      this.view.renderLocalState(this.reconciler.localState);
    }
    if (change.rolledBack) {
      this.view.notify(rejection ?? SEAT_TAKEN_MESSAGE, "warning");
    }
  }
}
