/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Commit Orchestrator
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Resolves every world's staged plan as one simultaneous turn.
 *
 * Each world's result is built on a working copy of the world map. Nothing
 * reaches the returned state until every world and the global hand check
 * have passed; a rejection returns the input worlds untouched.
 *
 * Pipeline:
 *   staging -> validating -> (per world: timeline -> move/drop)
 *           -> global hand -> collapse -> loss -> applied
 *   any failure                                  -> rejected
 */

import { MovePlan, PieceType, WorldLine } from '../../types/game';
import { collapseByCount } from '../collapseLogic';
import { cloneSnapshot, presentOf, sortedWorldIds } from '../core';
import { entityNotFound } from '../errors';
import { mutateDrop } from '../mutators/DropMutator';
import { mutateMovement } from '../mutators/MovementMutator';
import { mutateMessage, mutateTurnChange } from '../mutators/TurnMutator';
import {
  ExecutionContext,
  GameState,
  ValidationErrorCode,
  ValidationFailure,
  ValidationOutcome,
  isValidOutcome,
  validOutcome,
} from '../types';
import { validateTimeline } from '../validators/TimelineValidator';
import { isWorldLost } from '../victoryLogic';
import { handInventory, presentSnapshots } from '../worldStateHelpers';
import { debugLog, isCommitDebugEnabled } from '../../utils/envFlags';
import { CommitPhaseMachine } from './commitPhaseMachine';
import type { CommitSummary, CommitTurnResult, WorldCommitRecord } from './types';

/**
 * Resolve one world's plan into `working`, replacing the world's entry with
 * a copy whose history has the new present appended and registering the
 * forked world when the plan branches.
 */
function resolveWorld(
  working: Map<number, WorldLine>,
  worldId: number,
  plan: MovePlan,
  ctx: ExecutionContext
): ValidationOutcome<WorldCommitRecord> {
  const world = working.get(worldId);
  if (!world) {
    throw entityNotFound('world', { worldId }, 'CommitOrchestrator');
  }

  const timeline = validateTimeline(world, plan, working, ctx.settings);
  if (!isValidOutcome(timeline)) {
    return timeline;
  }
  const { baseTime, branching, targetWorldId } = timeline.data;

  const source = cloneSnapshot(presentOf(world));
  const target = branching ? cloneSnapshot(world.history[baseTime]) : source;

  const execute = plan.mode === 'drop' ? mutateDrop : mutateMovement;
  const applied = execute(source, target, plan, ctx);
  if (!isValidOutcome(applied)) {
    return applied;
  }

  working.set(worldId, { ...world, history: [...world.history, source] });
  if (branching) {
    working.set(targetWorldId, { id: targetWorldId, history: [target], staged: null, lost: false });
  }

  return validOutcome({ worldId, targetWorldId, branching, application: applied.data });
}

/**
 * First type whose drops this commit exceed the mover's hand pieces
 * carrying it across every world, or null when all are covered.
 */
function findGlobalHandShortfall(
  working: ReadonlyMap<number, WorldLine>,
  ctx: ExecutionContext
): PieceType | null {
  const available = handInventory(presentSnapshots(working), ctx.mover);
  for (const [type, used] of ctx.globalHandUsage) {
    if (used > available[type]) {
      return type;
    }
  }
  return null;
}

function reject(
  state: GameState,
  machine: CommitPhaseMachine,
  failure: ValidationFailure,
  message: string,
  failedWorldId?: number
): CommitTurnResult {
  machine.transition('rejected');
  debugLog(isCommitDebugEnabled(), '[commitTurn] rejected', {
    gameId: state.id,
    code: failure.code,
    failedWorldId,
  });
  return {
    nextState: mutateMessage(state, message),
    outcome: failure,
    phases: [...machine.phases],
    failedWorldId,
  };
}

/**
 * Commit every world's staged plan simultaneously.
 *
 * Worlds are processed in ascending id order over the worlds that exist
 * when the commit starts; worlds forked during the commit count towards
 * the world limit and id collisions of later worlds but stage nothing
 * themselves.
 */
export function commitTurn(state: GameState): CommitTurnResult {
  const machine = new CommitPhaseMachine();
  machine.transition('validating');

  const worldIds = sortedWorldIds(state.worlds);
  const plans: Array<[number, MovePlan]> = [];
  for (const worldId of worldIds) {
    const staged = state.worlds.get(worldId)?.staged ?? null;
    if (staged === null) {
      const reason = `World ${worldId} has no staged move`;
      const failure: ValidationFailure = {
        valid: false,
        code: ValidationErrorCode.COMMIT_MISSING_STAGED_INPUT,
        reason,
        context: { worldId },
      };
      return reject(state, machine, failure, reason, worldId);
    }
    plans.push([worldId, staged]);
  }

  const working = new Map(state.worlds);
  const ctx: ExecutionContext = {
    mover: state.turn,
    settings: state.settings,
    globalHandUsage: new Map(),
  };

  const records: WorldCommitRecord[] = [];
  for (const [worldId, plan] of plans) {
    const resolved = resolveWorld(working, worldId, plan, ctx);
    if (!isValidOutcome(resolved)) {
      return reject(
        state,
        machine,
        resolved,
        `Illegal move in world ${worldId}: ${resolved.reason}`,
        worldId
      );
    }
    records.push(resolved.data);
  }

  if (state.settings.handMode === 'global') {
    const shortfall = findGlobalHandShortfall(working, ctx);
    if (shortfall !== null) {
      const reason = `Global hand shortfall: ${shortfall}`;
      const failure: ValidationFailure = {
        valid: false,
        code: ValidationErrorCode.COMMIT_INSUFFICIENT_GLOBAL_HAND,
        reason,
        context: { type: shortfall, used: ctx.globalHandUsage.get(shortfall) },
      };
      return reject(state, machine, failure, reason);
    }
  }

  // Everything resolved; the working copies become the new worlds.
  const collapse = collapseByCount(presentSnapshots(working));

  const worlds = new Map<number, WorldLine>();
  const lostWorlds: number[] = [];
  for (const worldId of sortedWorldIds(working)) {
    const world = working.get(worldId);
    if (!world) {
      throw entityNotFound('world', { worldId }, 'CommitOrchestrator');
    }
    const lost = isWorldLost(presentOf(world));
    if (lost && !world.lost) {
      lostWorlds.push(worldId);
    }
    worlds.set(worldId, { ...world, staged: null, lost });
  }

  machine.transition('applied');

  const nextState = mutateTurnChange(
    { ...state, worlds },
    `Turn ${state.turnNumber + 1} committed across ${worldIds.length} world(s)`
  );
  const summary: CommitSummary = {
    turnNumber: nextState.turnNumber,
    records,
    createdWorlds: records.filter((r) => r.branching).map((r) => r.targetWorldId),
    lostWorlds,
    collapsedPieces: collapse.collapsedPieces,
  };

  debugLog(isCommitDebugEnabled(), '[commitTurn] applied', {
    gameId: state.id,
    turnNumber: summary.turnNumber,
    createdWorlds: summary.createdWorlds,
    collapsedPieces: summary.collapsedPieces,
  });

  return { nextState, outcome: validOutcome(summary), phases: [...machine.phases] };
}
