import { useEffect, useMemo, useSyncExternalStore } from "react";
import type { StoreApi } from "zustand/vanilla";

import type { CycleOrchestrator, CycleRunResult, CycleTriggerParams, OperationState } from "../lib/cycle_orchestrator";
import type { StageTrackerState } from "../lib/stage_tracker";

export type CycleRunner = {
  state: OperationState;
  stages: StageTrackerState;
  trigger: (params: CycleTriggerParams) => Promise<CycleRunResult>;
  cancel: () => boolean;
};

// Server renders read the live state, not the store's initial one.
function use_store_state<T>(store: StoreApi<T>): T {
  return useSyncExternalStore(store.subscribe, store.getState, store.getState);
}

// Components read store snapshots only; every mutation goes through the orchestrator.
export function use_cycle_runner(orchestrator: CycleOrchestrator): CycleRunner {
  const state = use_store_state(orchestrator.state);
  const stages = use_store_state(orchestrator.stages.store);

  useEffect(() => () => orchestrator.dispose(), [orchestrator]);

  return useMemo(
    () => ({
      state,
      stages,
      trigger: (params: CycleTriggerParams) => orchestrator.trigger(params),
      cancel: () => orchestrator.cancel(),
    }),
    [orchestrator, state, stages]
  );
}
