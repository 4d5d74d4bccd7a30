/**
 * Seat/room state reconciler
 *
 * Pure state: the room-wide occupancy map plus the local participant's
 * standing/seated state. Local claims are applied optimistically; every
 * relay message is authoritative and overrides them. One seat per occupant
 * and one occupant per seat hold after every operation.
 */
import type { Participant } from "../../protocol/messages.js";
import { isSeatInLayout, type SeatLayout } from "../../protocol/seats.js";
import type { LocalSeatState, Occupant, SeatLabel } from "./types.js";

export interface SelfIdentity {
  id: string;
  displayName: string;
  role: Occupant["role"];
}

export interface ReconcileChange {
  changedSeats: string[];
  membershipChanged: boolean;
  localChanged: boolean;
  /** An optimistic claim of ours was overturned */
  rolledBack: boolean;
}

export type SeatClaimResult =
  | { ok: true; seatId: string; change: ReconcileChange }
  | { ok: false; reason: "not_in_layout" | "occupied" | "already_seated" };

export type StandUpResult =
  | { ok: true; seatId: string; change: ReconcileChange }
  | { ok: false; reason: "not_seated" };

export interface SnapshotResult {
  change: ReconcileChange;
  /** A claim still awaiting confirmation that the relay may never have seen */
  pendingClaim: string | null;
}

class ChangeSet {
  private readonly seats = new Set<string>();
  membershipChanged = false;
  localChanged = false;
  rolledBack = false;

  seat(seatId: string): void {
    this.seats.add(seatId);
  }

  toChange(): ReconcileChange {
    return {
      changedSeats: [...this.seats],
      membershipChanged: this.membershipChanged,
      localChanged: this.localChanged,
      rolledBack: this.rolledBack,
    };
  }
}

const STANDING: LocalSeatState = { kind: "standing" };

export class SeatReconciler {
  private readonly occupants = new Map<string, Occupant>();
  /** seat id → user id */
  private readonly seats = new Map<string, string>();
  private local: LocalSeatState = STANDING;

  constructor(
    private readonly self: SelfIdentity,
    readonly layout: SeatLayout,
  ) {
    this.occupants.set(self.id, this.selfOccupant(null));
  }

  get selfId(): string {
    return this.self.id;
  }

  get localState(): LocalSeatState {
    return this.local;
  }

  occupantOf(seatId: string): Occupant | null {
    const userId = this.seats.get(seatId);
    return userId === undefined ? null : (this.occupants.get(userId) ?? null);
  }

  occupant(userId: string): Occupant | null {
    return this.occupants.get(userId) ?? null;
  }

  /** Occupants ordered by display name, self included */
  listOccupants(): Occupant[] {
    return [...this.occupants.values()].sort(
      (a, b) => a.displayName.localeCompare(b.displayName) || a.id.localeCompare(b.id),
    );
  }

  seatEntries(): [seatId: string, userId: string][] {
    return [...this.seats.entries()];
  }

  labelFor(seatId: string): SeatLabel | null {
    const occupant = this.occupantOf(seatId);
    if (!occupant) return null;

    const isSelf = occupant.id === this.self.id;
    return {
      userId: occupant.id,
      displayName: occupant.displayName,
      isSelf,
      pending: isSelf && this.local.kind === "seated" && !this.local.confirmed,
    };
  }

  // ─── Local intents ──────────────────────────────────────────

  /**
   * Optimistic Standing → Seated(seatId). Refused without side effects when
   * the seat is outside the layout, known to be occupied, or we are seated.
   */
  claim(seatId: string): SeatClaimResult {
    if (!isSeatInLayout(seatId, this.layout)) {
      return { ok: false, reason: "not_in_layout" };
    }
    if (this.local.kind === "seated") {
      return { ok: false, reason: "already_seated" };
    }
    if (this.seats.has(seatId)) {
      return { ok: false, reason: "occupied" };
    }

    const changes = new ChangeSet();
    this.assign(this.self.id, seatId, changes);
    this.setLocal({ kind: "seated", seatId, confirmed: false }, changes);
    return { ok: true, seatId, change: changes.toChange() };
  }

  standUp(): StandUpResult {
    if (this.local.kind !== "seated") {
      return { ok: false, reason: "not_seated" };
    }

    const { seatId } = this.local;
    const changes = new ChangeSet();
    this.vacate(seatId, this.self.id, changes);
    this.setLocal(STANDING, changes);
    return { ok: true, seatId, change: changes.toChange() };
  }

  // ─── Relay messages ─────────────────────────────────────────

  /**
   * Full roster from the relay. Replaces everything we knew, except that a
   * pending claim on a seat the snapshot shows free is kept.
   */
  applySnapshot(participants: readonly Participant[]): SnapshotResult {
    const changes = new ChangeSet();
    changes.membershipChanged = true;

    const previousSeats = new Map(this.seats);
    const pending =
      this.local.kind === "seated" && !this.local.confirmed ? this.local.seatId : null;

    this.occupants.clear();
    this.seats.clear();

    for (const participant of participants) {
      const occupant = toOccupant(participant);
      if (occupant.seatId !== null) {
        if (this.seats.has(occupant.seatId)) {
          occupant.seatId = null;
        } else {
          this.seats.set(occupant.seatId, occupant.id);
        }
      }
      this.occupants.set(occupant.id, occupant);
    }

    if (!this.occupants.has(this.self.id)) {
      this.occupants.set(this.self.id, this.selfOccupant(null));
    }
    const selfSeat = this.occupants.get(this.self.id)?.seatId ?? null;

    let pendingClaim: string | null = null;
    if (selfSeat !== null) {
      this.setLocal({ kind: "seated", seatId: selfSeat, confirmed: true }, changes);
    } else if (pending !== null && !this.seats.has(pending)) {
      this.assign(this.self.id, pending, changes);
      pendingClaim = pending;
    } else {
      if (pending !== null) changes.rolledBack = true;
      this.setLocal(STANDING, changes);
    }

    for (const seatId of new Set([...previousSeats.keys(), ...this.seats.keys()])) {
      if (previousSeats.get(seatId) !== this.seats.get(seatId)) {
        changes.seat(seatId);
      }
    }

    return { change: changes.toChange(), pendingClaim };
  }

  /**
   * `user` now holds `seatId`, whoever we thought had it
   */
  applySeatUpdated(seatId: string, user: Participant): ReconcileChange {
    const changes = new ChangeSet();
    this.upsert(user, changes);

    const displaced = this.seats.get(seatId);
    this.assign(user.id, seatId, changes);

    if (user.id === this.self.id) {
      this.setLocal({ kind: "seated", seatId, confirmed: true }, changes);
    } else if (displaced === this.self.id) {
      changes.rolledBack = this.local.kind === "seated" && !this.local.confirmed;
      this.setLocal(STANDING, changes);
    }

    return changes.toChange();
  }

  applySeatLeft(seatId: string, userId: string): ReconcileChange {
    const changes = new ChangeSet();
    // Stale if the seat has moved on to someone else
    if (this.seats.get(seatId) !== userId) {
      return changes.toChange();
    }

    this.vacate(seatId, userId, changes);
    if (userId === this.self.id && this.local.kind === "seated" && this.local.seatId === seatId) {
      this.setLocal(STANDING, changes);
    }
    return changes.toChange();
  }

  /**
   * Our claim on `seatId` lost the race
   */
  applySeatOccupied(seatId: string, occupantId: string | null): ReconcileChange {
    const changes = new ChangeSet();

    if (this.local.kind === "seated" && this.local.seatId === seatId) {
      this.vacate(seatId, this.self.id, changes);
      this.setLocal(STANDING, changes);
      changes.rolledBack = true;
    }

    if (occupantId !== null && occupantId !== this.self.id && this.occupants.has(occupantId)) {
      this.assign(occupantId, seatId, changes);
    }

    return changes.toChange();
  }

  applyParticipantJoined(participant: Participant): ReconcileChange {
    const changes = new ChangeSet();
    if (participant.id === this.self.id) {
      return changes.toChange();
    }

    this.upsert(participant, changes);
    if (participant.seat_id !== null) {
      this.assign(participant.id, participant.seat_id, changes);
      if (this.local.kind === "seated" && this.local.seatId === participant.seat_id) {
        changes.rolledBack = !this.local.confirmed;
        this.setLocal(STANDING, changes);
      }
    }
    return changes.toChange();
  }

  applyParticipantLeft(userId: string): ReconcileChange {
    const changes = new ChangeSet();
    const occupant = this.occupants.get(userId);
    if (!occupant || userId === this.self.id) {
      return changes.toChange();
    }

    if (occupant.seatId !== null) {
      this.vacate(occupant.seatId, userId, changes);
    }
    this.occupants.delete(userId);
    changes.membershipChanged = true;
    return changes.toChange();
  }

  /**
   * Flag remote occupants while our relay link is down; the next snapshot
   * replaces them.
   */
  setRemoteConnected(connected: boolean): ReconcileChange {
    const changes = new ChangeSet();
    for (const occupant of this.occupants.values()) {
      if (occupant.id !== this.self.id && occupant.connected !== connected) {
        occupant.connected = connected;
        changes.membershipChanged = true;
      }
    }
    return changes.toChange();
  }

  // ─── Internals ──────────────────────────────────────────────

  private selfOccupant(seatId: string | null): Occupant {
    return {
      id: this.self.id,
      displayName: this.self.displayName,
      role: this.self.role,
      seatId,
      connected: true,
    };
  }

  private upsert(participant: Participant, changes: ChangeSet): void {
    const existing = this.occupants.get(participant.id);
    if (existing) {
      if (existing.displayName !== participant.display_name || !existing.connected) {
        existing.displayName = participant.display_name;
        existing.connected = true;
        changes.membershipChanged = true;
      }
      return;
    }

    this.occupants.set(participant.id, { ...toOccupant(participant), seatId: null });
    changes.membershipChanged = true;
  }

  /**
   * Seat `userId` at `seatId`, evicting the seat's current occupant and
   * freeing the user's previous seat.
   */
  private assign(userId: string, seatId: string, changes: ChangeSet): void {
    const current = this.seats.get(seatId);
    if (current === userId) return;

    if (current !== undefined) {
      const evicted = this.occupants.get(current);
      if (evicted) evicted.seatId = null;
    }

    const occupant = this.occupants.get(userId);
    if (occupant && occupant.seatId !== null) {
      this.seats.delete(occupant.seatId);
      changes.seat(occupant.seatId);
    }

    this.seats.set(seatId, userId);
    if (occupant) occupant.seatId = seatId;

    changes.seat(seatId);
    changes.membershipChanged = true;
  }

  private vacate(seatId: string, userId: string, changes: ChangeSet): void {
    if (this.seats.get(seatId) !== userId) return;

    this.seats.delete(seatId);
    const occupant = this.occupants.get(userId);
    if (occupant) occupant.seatId = null;

    changes.seat(seatId);
    changes.membershipChanged = true;
  }

  private setLocal(next: LocalSeatState, changes: ChangeSet): void {
    if (sameLocalState(this.local, next)) return;
    // Seat labels show whether our claim is still pending
    if (this.local.kind === "seated") changes.seat(this.local.seatId);
    if (next.kind === "seated") changes.seat(next.seatId);
    this.local = next;
    changes.localChanged = true;
  }
}

function toOccupant(participant: Participant): Occupant {
  return {
    id: participant.id,
    displayName: participant.display_name,
    role: participant.role,
    seatId: participant.seat_id,
    connected: true,
  };
}

function sameLocalState(a: LocalSeatState, b: LocalSeatState): boolean {
  if (a.kind === "standing" || b.kind === "standing") return a.kind === b.kind;
  return a.seatId === b.seatId && a.confirmed === b.confirmed;
}
