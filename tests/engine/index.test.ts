import {
  applyCommands,
  init,
  onGravityTick,
  onLockDelayExpired,
  setGhostEnabled,
} from "@/engine";
import { OnePieceRng } from "@/engine/core/rng/one-piece";
import { SequenceRng } from "@/engine/core/rng/sequence";
import { createEngineConfig, defaultEngineConfig } from "@/engine/init";
import { activePiece } from "@/engine/types";
import { createDurationMs, createSeed } from "@/types/brands";

describe("@/engine/index - public entry points", () => {
  describe("init()", () => {
    test("one spawned piece, zeroed counters, gravity armed at level 0", () => {
      const r = init(defaultEngineConfig, new OnePieceRng("T"));

      expect(r.state.pieces).toHaveLength(1);
      expect(activePiece(r.state).id).toBe("T");
      expect(r.state).toMatchObject({
        debugOverlay: false,
        ghostEnabled: false,
        level: 0,
        linesTowardLevel: 0,
        paused: false,
        phase: "falling",
        score: 0,
        totalLines: 0,
      });
      expect(r.state.playfield).toEqual({ cellSize: 30, height: 600, width: 300 });
      expect(r.events).toEqual([
        { durationMs: 800, kind: "TimerReconfigure", timer: "gravity" },
        { kind: "RequestRedraw" },
      ]);
    });

    test("the default generator is seeded from the config", () => {
      const cfg = createEngineConfig({ seed: createSeed("test-seed") });
      const a = init(cfg);
      const b = init(cfg);

      expect(activePiece(a.state).id).toBe(activePiece(b.state).id);
    });

    test("custom cell size scales the playfield and pieces", () => {
      const r = init(createEngineConfig({ cellSize: 20 }), new OnePieceRng("I"));

      expect(r.state.playfield).toEqual({ cellSize: 20, height: 400, width: 200 });
      expect(activePiece(r.state).rects).toEqual([
        { height: 20, width: 80, x: 60, y: 0 },
      ]);
    });

    test("a gravity interval that is not positive is rejected", () => {
      expect(() =>
        createEngineConfig({
          gravityIntervalsMs: [createDurationMs(800), createDurationMs(0)],
        }),
      ).toThrow("gravityIntervalsMs entries must be positive");
    });

    test("custom gravity table drives the first interval", () => {
      const cfg = createEngineConfig({
        gravityIntervalsMs: [createDurationMs(250)],
      });

      expect(init(cfg, new OnePieceRng("I")).events[0]).toEqual({
        durationMs: 250,
        kind: "TimerReconfigure",
        timer: "gravity",
      });
    });
  });

  describe("createEngineConfig()", () => {
    test("rejects an empty gravity table", () => {
      expect(() => createEngineConfig({ gravityIntervalsMs: [] })).toThrow(
        "gravityIntervalsMs must hold at least one interval",
      );
    });

    test("rejects a non-positive lines-per-level", () => {
      expect(() => createEngineConfig({ linesPerLevel: 0 })).toThrow(
        "linesPerLevel must be a positive integer",
      );
    });
  });

  describe("setGhostEnabled()", () => {
    test("redraws only when the flag changes", () => {
      const { state } = init(defaultEngineConfig, new OnePieceRng("I"));

      const on = setGhostEnabled(state, true);
      expect(on.state.ghostEnabled).toBe(true);
      expect(on.events).toEqual([{ kind: "RequestRedraw" }]);

      const again = setGhostEnabled(on.state, true);
      expect(again.state).toBe(on.state);
      expect(again.events).toEqual([]);
    });
  });

  test("pieces come from the generator in order", () => {
    const { state } = init(defaultEngineConfig, new SequenceRng(["O", "T", "S"]));
    const dropped = applyCommands(state, [{ kind: "HardDrop" }]).state;
    const afterFirst = onLockDelayExpired(dropped).state;
    const afterSecond = onLockDelayExpired(
      applyCommands(afterFirst, [{ kind: "HardDrop" }]).state,
    ).state;

    expect(afterSecond.pieces.map((p) => p.id)).toEqual(["O", "T", "S"]);
    expect(onGravityTick(afterSecond).events).toEqual([{ kind: "RequestRedraw" }]);
  });
});
