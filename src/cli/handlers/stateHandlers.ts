import { AdaptiveRouter } from '../../core/routing';
import type { TelemetryStore } from '../../core/telemetry';
import type { CLIError, CLIResult } from '../types';
import { ErrorReasons, success } from '../types';
import { openStore, toCLIError } from '../helpers';

function stateRouter(store: TelemetryStore): AdaptiveRouter {
  return new AdaptiveRouter({ vocab: new Set(), rareTerms: new Set(), store });
}

export async function handleStateShow(input: { db?: string }): Promise<CLIResult | CLIError> {
  let store: TelemetryStore | null = null;
  try {
    store = openStore(input);
    const router = stateRouter(store);
    return success({ backend: store.backend, key: router.stateKey, state: await router.loadState() });
  } catch (e) {
    return toCLIError(e, ErrorReasons.STORAGE_FAILED);
  } finally {
    await store?.close();
  }
}

export async function handleStateReset(input: { db?: string; lr?: number }): Promise<CLIResult | CLIError> {
  let store: TelemetryStore | null = null;
  try {
    store = openStore(input);
    const router = stateRouter(store);
    return success({ backend: store.backend, key: router.stateKey, state: await router.resetState(input.lr) });
  } catch (e) {
    return toCLIError(e, ErrorReasons.STORAGE_FAILED);
  } finally {
    await store?.close();
  }
}
