import { createPathfinder, solve, Pathfinder } from "../pathfinder";
import { MazeProblem } from "../maze";
import { SearchLimitError } from "../errors";
import { validateSolution } from "../validate";
import type { Action, Position, TransitionModel } from "../types";

// ── Shared mazes ─────────────────────────────────────────────────────────────

const OPEN_MAZE = ["XXXXX", "XI..X", "X.X.X", "X.G.X", "XXXXX"];

/** Key to the left of the start, goal to the right: the key forces a detour. */
const KEY_DETOUR = ["XXXXXXX", "XK.I.GX", "XXXXXXX"];

/** The only route to the goal runs through the key. */
const KEY_GATE = ["XXXXX", "XIK.X", "XXX.X", "X.G.X", "XXXXX"];

/** The key is walled off although the goal is two steps away. */
const WALLED_KEY = ["XXXXXXX", "XKXI.GX", "XXXXXXX"];

/** The key is reachable but a wall separates it from the goal. */
const WALLED_GOAL = ["XXXXXXX", "XIK.XGX", "XXXXXXX"];

/** Two equal-length routes; the upper one crosses difficult terrain. */
const TERRAIN = ["XXXXX", "XIM.X", "X.X.X", "X..GX", "XXXXX"];

const TWO_GOALS = ["XXXXXXXX", "XG.I..GX", "XXXXXXXX"];

// ── Phase 2 only (no key) ────────────────────────────────────────────────────

describe("createPathfinder – no key", () => {
  it("finds the cheapest route straight to the goal", () => {
    const result = createPathfinder({ problem: MazeProblem.fromRows(OPEN_MAZE) }).search();

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.actions).toEqual(["D", "D", "R"]);
    expect(result.cost).toBe(3);
    expect(result.expansions).toBe(4);
  });

  it("lands on a goal cell", () => {
    const problem = MazeProblem.fromRows(OPEN_MAZE);
    const actions = solve(problem);

    expect(actions).not.toBeNull();
    if (actions === null) return;
    let position: Position = problem.initial;
    for (const action of actions) {
      const next = problem.transitions(position).get(action);
      expect(next).toBeDefined();
      if (next === undefined) return;
      position = next;
    }
    expect(problem.isGoal(position)).toBe(true);
  });

  it("heads for the nearest of several goals", () => {
    const result = createPathfinder({ problem: MazeProblem.fromRows(TWO_GOALS) }).search();

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.actions).toEqual(["L", "L"]);
    expect(result.cost).toBe(2);
  });

  it("runs only the goal phase", () => {
    const phases: string[] = [];
    createPathfinder({
      problem: MazeProblem.fromRows(OPEN_MAZE),
      hooks: { onPhaseStart: (phase) => phases.push(phase) },
    }).search();

    expect(phases).toEqual(["goal"]);
  });
});

// ── Key, then goal ───────────────────────────────────────────────────────────

describe("createPathfinder – key then goal", () => {
  it("collects the key before heading to the goal", () => {
    const result = createPathfinder({ problem: MazeProblem.fromRows(KEY_DETOUR) }).search();

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.actions).toEqual(["L", "L", "R", "R", "R", "R"]);
    expect(result.cost).toBe(6);
    expect(result.expansions).toBe(6);
  });

  it("passes through the key when it gates the goal", () => {
    const problem = MazeProblem.fromRows(KEY_GATE);
    const actions = solve(problem);

    expect(actions).toEqual(["R", "R", "D", "D", "L"]);
    expect(problem.validate(actions)).toEqual({ isSolution: true, cost: 5 });
  });

  it("produces a sequence that fails validation once the key prefix is dropped", () => {
    const problem = MazeProblem.fromRows(KEY_DETOUR);
    const actions = solve(problem);

    expect(actions).not.toBeNull();
    if (actions === null) return;
    expect(problem.validate(actions.slice(2))).toEqual({ isSolution: false, cost: -1 });
  });

  it("reports KEY_UNREACHABLE when the key is walled off", () => {
    const result = createPathfinder({ problem: MazeProblem.fromRows(WALLED_KEY) }).search();

    expect(result).toEqual({ success: false, reason: "KEY_UNREACHABLE", expansions: 3 });
  });

  it("reports GOAL_UNREACHABLE when no goal can be reached from the key", () => {
    const result = createPathfinder({ problem: MazeProblem.fromRows(WALLED_GOAL) }).search();

    expect(result).toEqual({ success: false, reason: "GOAL_UNREACHABLE", expansions: 4 });
  });
});

// ── Costs ────────────────────────────────────────────────────────────────────

describe("createPathfinder – terrain costs", () => {
  it("prefers the open route over difficult terrain of equal length", () => {
    const result = createPathfinder({ problem: MazeProblem.fromRows(TERRAIN) }).search();

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.actions).toEqual(["D", "D", "R", "R"]);
    expect(result.cost).toBe(4);
  });

  it("charges more for the route through difficult terrain", () => {
    const problem = MazeProblem.fromRows(TERRAIN);

    expect(problem.validate(["R", "R", "D", "D"])).toEqual({ isSolution: true, cost: 6 });
    expect(problem.validate(["D", "D", "R", "R"])).toEqual({ isSolution: true, cost: 4 });
  });
});

// ── Properties ───────────────────────────────────────────────────────────────

describe("createPathfinder – properties", () => {
  const solvable = { OPEN_MAZE, KEY_DETOUR, KEY_GATE, TERRAIN, TWO_GOALS };

  it.each(Object.entries(solvable))(
    "returns a sequence whose validated cost matches the search cost (%s)",
    (_name, rows) => {
      const problem = MazeProblem.fromRows(rows);
      const result = createPathfinder({ problem }).search();

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(problem.validate(result.actions)).toEqual({ isSolution: true, cost: result.cost });
    }
  );

  it("is deterministic across repeated searches", () => {
    const problem = MazeProblem.fromRows(KEY_DETOUR);
    const first = createPathfinder({ problem }).search();
    const second = createPathfinder({ problem }).search();

    expect(second).toEqual(first);
  });

  it("handles long corridors without recursion", () => {
    const length = 5000;
    const problem = MazeProblem.fromRows(["I" + ".".repeat(length) + "G"]);
    const result = createPathfinder({ problem }).search();

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.actions).toHaveLength(length + 1);
    expect(result.actions.every((a) => a === "R")).toBe(true);
    expect(result.cost).toBe(length + 1);
  });
});

// ── Custom transition models ─────────────────────────────────────────────────

describe("createPathfinder – custom TransitionModel", () => {
  function makeModel(goals: Position[]): TransitionModel {
    const model: TransitionModel = {
      initial: { col: 0, row: 0 },
      key: null,
      goals,
      transitions: (state) =>
        new Map<Action, Position>(state.col < 3 ? [["R", { col: state.col + 1, row: 0 }]] : []),
      cost: () => 2,
      isGoal: (state) => goals.some((g) => g.col === state.col && g.row === state.row),
      validate: (actions) => validateSolution(model, actions),
    };
    return model;
  }

  it("searches any model that implements the interface", () => {
    const result = createPathfinder({ problem: makeModel([{ col: 3, row: 0 }]) }).search();

    expect(result).toEqual({ success: true, actions: ["R", "R", "R"], cost: 6, expansions: 3 });
  });

  it("skips the key phase when the model starts on its key", () => {
    const start = { col: 0, row: 0 };
    const goal = { col: 1, row: 0 };
    const model: TransitionModel = {
      initial: start,
      key: start,
      goals: [goal],
      transitions: (state) =>
        new Map<Action, Position>(state.col === 0 ? [["R", goal]] : [["L", start]]),
      cost: () => 1,
      isGoal: (state) => state.col === goal.col && state.row === goal.row,
      validate: (actions) => validateSolution(model, actions),
    };
    const phases: string[] = [];

    const result = createPathfinder({
      problem: model,
      hooks: { onPhaseStart: (phase) => phases.push(phase) },
    }).search();

    expect(result).toEqual({ success: true, actions: ["R"], cost: 1, expansions: 1 });
    expect(phases).toEqual(["goal"]);
    expect(model.validate(["R"])).toEqual({ isSolution: true, cost: 1 });
  });

  it("fails without expanding anything when the goal set is empty", () => {
    const result = createPathfinder({ problem: makeModel([]) }).search();

    expect(result).toEqual({ success: false, reason: "GOAL_UNREACHABLE", expansions: 0 });
  });
});

// ── Expansion limit ──────────────────────────────────────────────────────────

describe("createPathfinder – maxExpansions", () => {
  it("throws SearchLimitError when the limit is exceeded", () => {
    const search = createPathfinder({
      problem: MazeProblem.fromRows(OPEN_MAZE),
      maxExpansions: 3,
    });

    expect(() => search.search()).toThrow(SearchLimitError);
  });

  it("counts expansions across both phases", () => {
    const search = createPathfinder({
      problem: MazeProblem.fromRows(KEY_DETOUR),
      maxExpansions: 5,
    });

    expect(() => search.search()).toThrow("maximum of 5 node expansions");
  });

  it("succeeds when the limit is exactly the number of expansions needed", () => {
    const result = createPathfinder({
      problem: MazeProblem.fromRows(OPEN_MAZE),
      maxExpansions: 4,
    }).search();

    expect(result.success).toBe(true);
  });

  it.each([0, -1, 2.5])("rejects maxExpansions = %p", (maxExpansions) => {
    expect(() =>
      createPathfinder({ problem: MazeProblem.fromRows(OPEN_MAZE), maxExpansions })
    ).toThrow(RangeError);
  });
});

// ── solve() and the Pathfinder class ─────────────────────────────────────────

describe("solve", () => {
  it("returns null, not an empty array, when there is no solution", () => {
    expect(solve(MazeProblem.fromRows(WALLED_KEY))).toBeNull();
    expect(solve(MazeProblem.fromRows(WALLED_GOAL))).toBeNull();
  });
});

describe("Pathfinder class", () => {
  it("solve() matches the functional API", () => {
    const problem = MazeProblem.fromRows(KEY_GATE);

    expect(new Pathfinder().solve(problem)).toEqual(solve(problem));
  });

  it("search() returns the full result", () => {
    const result = new Pathfinder().search(MazeProblem.fromRows(OPEN_MAZE));

    expect(result).toEqual({ success: true, actions: ["D", "D", "R"], cost: 3, expansions: 4 });
  });

  it("applies its expansion limit to every search", () => {
    const pathfinder = new Pathfinder(undefined, 1);

    expect(() => pathfinder.solve(MazeProblem.fromRows(OPEN_MAZE))).toThrow(SearchLimitError);
  });

  it("forwards hooks", () => {
    const expanded: number[] = [];
    new Pathfinder({ onNodeExpand: (_s, _p, n) => expanded.push(n) }).solve(
      MazeProblem.fromRows(OPEN_MAZE)
    );

    expect(expanded).toEqual([1, 2, 3, 4]);
  });
});
