import type { RetryPolicy } from "../config/config.js";
import { UploadExhaustedError } from "../core/errors.js";
import type { GeneratedBundle } from "../bundle/generator.js";
import { runBounded, type Task } from "../execution/pool.js";
import type { ObjectStore, PutContentOptions } from "./objectStore.js";
import { retryWithBudget, type RetryOutcome } from "./retry.js";

export type PublishAction = "uploaded" | "refreshed";

export interface PublishReceipt {
  backend: string;
  key: string;
  action: PublishAction;
  attempts: number;
}

export interface UploaderDeps {
  retry: RetryPolicy;
  log: (message: string) => void;
  sleep?: (ms: number) => Promise<void>;
}

function unwrap<T>(outcome: RetryOutcome<T>, store: ObjectStore, key: string): T {
  if (outcome.ok) return outcome.value;
  if (outcome.reason === "fatal") throw outcome.error;
  throw new UploadExhaustedError(store.describe(), key, outcome.attempts, { cause: outcome.error });
}

/**
 * Makes `remoteKey` hold the bundle. An object that is already present only
 * has its expiration clock reset; content is never sent twice.
 */
export async function publishObject(
  store: ObjectStore,
  localPath: string,
  remoteKey: string,
  deps: UploaderDeps
): Promise<PublishReceipt> {
  const label = `${store.describe()}:${remoteKey}`;
  const outcome = await retryWithBudget(
    async (): Promise<PublishAction> => {
      if (await store.exists(remoteKey)) {
        deps.log(`resetting expiration time for ${label}`);
        await store.refreshExpiration(remoteKey);
        deps.log(`expiration time reset for ${label}`);
        return "refreshed";
      }
      deps.log(`uploading ${label} from ${localPath}`);
      await store.upload(localPath, remoteKey);
      deps.log(`uploading ${label} completed`);
      return "uploaded";
    },
    deps.retry,
    {
      sleep: deps.sleep,
      onAttemptFailed: (err, attempt) =>
        deps.log(`${label} failed (attempt ${attempt}): ${err instanceof Error ? err.message : String(err)}`)
    }
  );
  const action = unwrap(outcome, store, remoteKey);
  return { backend: store.describe(), key: remoteKey, action, attempts: outcome.attempts };
}

export async function putContentWithRetry(
  store: ObjectStore,
  key: string,
  body: string,
  opts: PutContentOptions,
  deps: UploaderDeps
): Promise<void> {
  const outcome = await retryWithBudget(() => store.putContent(key, body, opts), deps.retry, { sleep: deps.sleep });
  unwrap(outcome, store, key);
}

/** One task per (backend, bundle) pair, backend-major in configured order. */
export async function uploadBundles(
  stores: readonly ObjectStore[],
  bundles: readonly GeneratedBundle[],
  deps: UploaderDeps & { concurrency: number }
): Promise<PublishReceipt[]> {
  const tasks: Task<PublishReceipt>[] = [];
  for (const store of stores) {
    for (const bundle of bundles) {
      tasks.push(() => publishObject(store, bundle.localPath, bundle.remoteKey, deps));
    }
  }
  return runBounded(tasks, deps.concurrency);
}
