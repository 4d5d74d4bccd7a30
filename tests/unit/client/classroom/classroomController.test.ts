import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  ClassroomController,
  SEAT_TAKEN_MESSAGE,
  STAND_UP_FIRST_MESSAGE,
} from "@src/client/classroom/classroomController.js";
import type { Interactable } from "@src/client/classroom/interaction.js";
import { RelayClient } from "@src/client/relay/relayClient.js";
import type { Participant } from "@src/protocol/messages.js";
import { FakeRelayServer, createFakeView, silentLogger } from "../../helpers/clientFakes.js";

const self = { id: "u1", displayName: "Ada", role: "participant" as const };
const me: Participant = { id: "u1", display_name: "Ada", role: "participant", seat_id: null };
const bob: Participant = { id: "u2", display_name: "Bob", role: "participant", seat_id: null };

const seat11: Interactable = { id: "seat-1-1", kind: "seat", label: "Seat", centerX: 100, centerY: 100 };
const board: Interactable = {
  id: "blackboard",
  kind: "blackboard",
  label: "Blackboard",
  centerX: 400,
  centerY: 20,
};

describe("ClassroomController", () => {
  let server: FakeRelayServer;
  let relay: RelayClient;
  let view: ReturnType<typeof createFakeView>;
  let controller: ClassroomController;

  const sent = () => server.current.sentMessages();

  function connectOpen() {
    relay.connect();
    server.current.open();
  }

  beforeEach(() => {
    vi.useFakeTimers();
    server = new FakeRelayServer();
    relay = new RelayClient(server.connector, { roomId: "room1", logger: silentLogger });
    view = createFakeView();
    controller = new ClassroomController({
      relay,
      view,
      self,
      layout: { rows: 5, columns: 6 },
      logger: silentLogger,
    });
    controller.start();
    controller.setInteractables([seat11, board]);
  });

  afterEach(() => {
    controller.dispose();
    relay.close();
    vi.useRealTimers();
  });

  it("asks for a snapshot every time the relay opens", () => {
    connectOpen();
    expect(sent()).toEqual([{ type: "join" }]);
    expect(view.setConnectionStatus.mock.calls.map(([status]) => status)).toEqual([
      "connecting",
      "connected",
    ]);

    server.current.drop();
    vi.advanceTimersByTime(3000);
    server.current.open();

    expect(sent()).toEqual([{ type: "join" }]);
    expect(view.setConnectionStatus).toHaveBeenLastCalledWith("connected");
  });

  it("renders the roster from a snapshot", () => {
    connectOpen();

    server.current.push({
      type: "participants_list",
      participants: [me, { ...bob, seat_id: "seat-0-0" }],
    });

    expect(view.renderSeat).toHaveBeenCalledWith("seat-0-0", {
      userId: "u2",
      displayName: "Bob",
      isSelf: false,
      pending: false,
    });
    expect(view.renderOccupants).toHaveBeenLastCalledWith(
      [
        { id: "u1", displayName: "Ada", role: "participant", seatId: null, connected: true },
        { id: "u2", displayName: "Bob", role: "participant", seatId: "seat-0-0", connected: true },
      ],
      "u1",
    );
  });

  it("sends a seat claim and shows it pending", () => {
    connectOpen();

    const result = controller.claimSeat("seat-1-1");

    expect(result.ok).toBe(true);
    expect(sent()).toEqual([{ type: "join" }, { type: "update_seat", seat_id: "seat-1-1" }]);
    expect(view.renderSeat).toHaveBeenCalledWith("seat-1-1", {
      userId: "u1",
      displayName: "Ada",
      isSelf: true,
      pending: true,
    });
  });

  it("re-sends an unconfirmed claim after reconnecting", () => {
    connectOpen();
    controller.claimSeat("seat-1-1");
    server.current.drop();
    vi.advanceTimersByTime(3000);
    server.current.open();

    server.current.push({ type: "participants_list", participants: [me, bob] });

    expect(sent()).toEqual([{ type: "join" }, { type: "update_seat", seat_id: "seat-1-1" }]);
    expect(controller.localState).toEqual({ kind: "seated", seatId: "seat-1-1", confirmed: false });
  });

  it("rolls back and warns when the relay reports the seat taken", () => {
    connectOpen();
    server.current.push({ type: "participants_list", participants: [me, bob] });
    controller.claimSeat("seat-1-1");

    server.current.push({
      type: "seat_occupied",
      seat_id: "seat-1-1",
      occupant_id: "u2",
      message: "This seat is already taken by another student.",
    });

    expect(controller.localState).toEqual({ kind: "standing" });
    expect(view.notify).toHaveBeenCalledWith(
      "This seat is already taken by another student.",
      "warning",
    );
    expect(view.renderLocalState).toHaveBeenLastCalledWith({ kind: "standing" });
  });

  it("warns when a joiner turns out to hold the seat we are claiming", () => {
    connectOpen();
    server.current.push({ type: "participants_list", participants: [me, bob] });
    controller.claimSeat("seat-1-1");

    server.current.push({
      type: "participant_joined",
      participant: { id: "u3", display_name: "Cleo", role: "participant", seat_id: "seat-1-1" },
    });

    expect(controller.localState).toEqual({ kind: "standing" });
    expect(view.notify).toHaveBeenCalledWith(SEAT_TAKEN_MESSAGE, "warning");
  });

  it("confirms our seat on seat_updated", () => {
    connectOpen();
    controller.claimSeat("seat-1-1");

    server.current.push({
      type: "seat_updated",
      seat_id: "seat-1-1",
      user: { ...me, seat_id: "seat-1-1" },
    });

    expect(controller.localState).toEqual({ kind: "seated", seatId: "seat-1-1", confirmed: true });
    expect(view.renderSeat).toHaveBeenLastCalledWith("seat-1-1", {
      userId: "u1",
      displayName: "Ada",
      isSelf: true,
      pending: false,
    });
  });

  describe("interact", () => {
    beforeEach(() => {
      connectOpen();
      server.current.push({ type: "participants_list", participants: [me, bob] });
    });

    it("does nothing with nothing nearby", () => {
      controller.updatePosition(0, 0);
      controller.interact();

      expect(sent()).toEqual([{ type: "join" }]);
    });

    it("sits on a nearby free seat and stands up on the second press", () => {
      expect(controller.updatePosition(110, 100)).toBe(true);
      expect(view.setNearbyInteractable).toHaveBeenLastCalledWith(seat11);

      controller.interact();
      controller.interact();

      expect(sent()).toEqual([
        { type: "join" },
        { type: "update_seat", seat_id: "seat-1-1" },
        { type: "leave_seat", seat_id: "seat-1-1" },
      ]);
      expect(controller.localState).toEqual({ kind: "standing" });
    });

    it("warns about an occupied seat without sending anything", () => {
      server.current.push({
        type: "seat_updated",
        seat_id: "seat-1-1",
        user: { ...bob, seat_id: "seat-1-1" },
      });
      controller.updatePosition(100, 100);

      controller.interact();

      expect(view.notify).toHaveBeenCalledWith(SEAT_TAKEN_MESSAGE, "warning");
      expect(sent()).toEqual([{ type: "join" }]);
    });

    it("opens other elements only while standing", () => {
      controller.updatePosition(400, 30);
      controller.interact();
      expect(view.openInteractable).toHaveBeenCalledWith(board);

      controller.claimSeat("seat-2-2");
      controller.interact();

      expect(view.openInteractable).toHaveBeenCalledTimes(1);
      expect(view.notify).toHaveBeenCalledWith(STAND_UP_FIRST_MESSAGE, "info");
    });

    it("does not move a seated player", () => {
      controller.claimSeat("seat-2-2");

      expect(controller.updatePosition(400, 30)).toBe(false);
      expect(controller.nearbyInteractable).toBeNull();
    });
  });

  it("toggles the raised hand", () => {
    connectOpen();

    controller.raiseHand();
    controller.raiseHand();

    expect(sent()).toEqual([
      { type: "join" },
      { type: "hand_raise", raised: true },
      { type: "hand_raise", raised: false },
    ]);
  });

  it("shows hands and clears them when the participant leaves", () => {
    connectOpen();
    server.current.push({ type: "participants_list", participants: [me, bob] });
    server.current.push({ type: "hand_raised", user_id: "u2", raised: true });

    server.current.push({ type: "participant_left", user_id: "u2" });

    expect(view.renderHand.mock.calls).toEqual([
      ["u2", true],
      ["u2", false],
    ]);
    expect(controller.state.occupant("u2")).toBeNull();
  });

  it("shares content and shows what others share", () => {
    connectOpen();

    expect(controller.shareContent("link", "https://example.test/slides", "Slides")).toBe(true);
    server.current.push({
      type: "content_shared",
      user_id: "u2",
      display_name: "Bob",
      content_type: "screenshot",
      content_url: "https://example.test/shot.png",
      description: "",
    });

    expect(sent()).toEqual([
      { type: "join" },
      {
        type: "shared_content",
        content_type: "link",
        content_url: "https://example.test/slides",
        description: "Slides",
      },
    ]);
    expect(view.showSharedContent).toHaveBeenCalledWith({
      userId: "u2",
      displayName: "Bob",
      isSelf: false,
      contentType: "screenshot",
      url: "https://example.test/shot.png",
      description: "",
    });
  });

  it("leaves round updates to the host", () => {
    connectOpen();
    const round = {
      status: "active",
      currentUserId: "u2",
      timeRemainingSeconds: 75,
      completedUserIds: [],
    } as const;
    const host = new ClassroomController({
      relay,
      view: createFakeView(),
      self: { id: "h1", displayName: "Hana", role: "host" },
      layout: { rows: 5, columns: 6 },
      logger: silentLogger,
    });

    expect(controller.updateRound(round)).toBe(false);
    expect(host.updateRound(round)).toBe(true);
    expect(sent()).toEqual([
      { type: "join" },
      {
        type: "update_round",
        status: "active",
        current_user_id: "u2",
        time_remaining: 75,
        completed_user_ids: [],
      },
    ]);
  });

  it("renders round updates with the speaker's name from the roster", () => {
    connectOpen();
    server.current.push({ type: "participants_list", participants: [me, bob] });

    server.current.push({
      type: "round_updated",
      status: "active",
      current_user_id: "u2",
      time_remaining: 30,
      completed_user_ids: ["u1"],
    });
    server.current.push({
      type: "round_updated",
      status: "active",
      current_user_id: "u9",
      time_remaining: 60,
      completed_user_ids: ["u1", "u2"],
    });

    expect(view.renderRound.mock.calls).toEqual([
      [
        {
          status: "active",
          currentUserId: "u2",
          currentDisplayName: "Bob",
          timeRemainingSeconds: 30,
          completedUserIds: ["u1"],
        },
      ],
      [
        {
          status: "active",
          currentUserId: "u9",
          currentDisplayName: null,
          timeRemainingSeconds: 60,
          completedUserIds: ["u1", "u2"],
        },
      ],
    ]);
  });

  it("marks remote occupants offline while reconnecting", () => {
    connectOpen();
    server.current.push({ type: "participants_list", participants: [me, bob] });

    server.current.drop();

    expect(view.setConnectionStatus).toHaveBeenLastCalledWith("reconnecting");
    expect(view.renderOccupants).toHaveBeenLastCalledWith(
      [
        { id: "u1", displayName: "Ada", role: "participant", seatId: null, connected: true },
        { id: "u2", displayName: "Bob", role: "participant", seatId: null, connected: false },
      ],
      "u1",
    );
  });

  it("surfaces relay errors", () => {
    connectOpen();

    server.current.push({ type: "error", message: "Too many requests" });

    expect(view.notify).toHaveBeenCalledWith("Too many requests", "error");
  });

  it("stops listening after dispose", () => {
    connectOpen();
    controller.dispose();

    server.current.push({ type: "participants_list", participants: [me, bob] });

    expect(view.renderOccupants).not.toHaveBeenCalled();
  });
});
