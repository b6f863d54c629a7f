/**
 * ModelRegistry
 * Owns the process-wide ModelHandle and its Unloaded / Loaded / Failed lifecycle.
 *
 * Inference borrows the current handle through a lease. Reload builds the new
 * handle completely before swapping it in, so a borrower only ever sees a fully
 * initialized handle; a handle that is swapped out while leased is released
 * once its last lease ends.
 */

import type {
  HandleState,
  ModelHandle,
  ModelState,
  ModelStatus,
  PredictionError,
  PredictionErrorCode
} from '../../types';
import { DIAGNOSIS_LABELS } from '../../config/labels';
import { ErrorHandler } from '../../utils/errorHandler';
import type { LoadRequest, ModelLoader } from './ModelLoader';

interface HandleSlot {
  handle: ModelHandle;
  leases: number;
  retired: boolean;
}

interface PendingReload {
  placeholder: boolean;
  promise: Promise<HandleState>;
}

export interface ModelLease {
  readonly handle: ModelHandle;
  release(): Promise<void>;
}

export class ModelRegistry {
  private state: ModelState = 'unloaded';
  private slot: HandleSlot | null = null;
  private lastError: string | null = null;
  private errorCode: PredictionErrorCode | null = null;
  private pendingReload: PendingReload | null = null;

  constructor(private readonly loader: ModelLoader) {}

  /**
   * Initial load at startup
   */
  initialize(request: LoadRequest = {}): Promise<HandleState> {
    return this.reload(request);
  }

  /**
   * Load a fresh handle and swap it in.
   * Concurrent callers asking for the same kind share one load; a request for
   * the other kind runs after the pending load finishes.
   */
  reload(request: LoadRequest = {}): Promise<HandleState> {
    const placeholder = request.placeholder === true;
    const pending = this.pendingReload;
    if (pending && pending.placeholder === placeholder) {
      return pending.promise;
    }

    // a failed pending load has already been reported to its own caller
    const previous = pending ? pending.promise.then(() => undefined, () => undefined) : Promise.resolve();
    const promise: Promise<HandleState> = previous
      .then(() => this.performReload({ placeholder }))
      .finally(() => {
        if (this.pendingReload?.promise === promise) {
          this.pendingReload = null;
        }
      });
    this.pendingReload = { placeholder, promise };
    return promise;
  }

  /**
   * Borrow the current handle for one inference; null when no handle is usable.
   */
  acquire(): ModelLease | null {
    const slot = this.slot;
    if (this.state !== 'loaded' || !slot) {
      return null;
    }

    slot.leases += 1;
    let released = false;
    return {
      handle: slot.handle,
      release: async () => {
        if (released) {
          return;
        }
        released = true;
        slot.leases -= 1;
        if (slot.retired && slot.leases === 0) {
          await this.releaseHandle(slot.handle);
        }
      }
    };
  }

  /**
   * Mark the handle Failed after a fatal error, if it is still the current one.
   */
  async markFailed(handle: ModelHandle, error: PredictionError): Promise<void> {
    if (!this.slot || this.slot.handle.id !== handle.id) {
      return;
    }
    console.error(ErrorHandler.getLogMessage(error, `Model ${handle.version}`));
    const previous = this.slot;
    this.slot = null;
    this.state = 'failed';
    this.lastError = error.message;
    this.errorCode = error.code;
    await this.retire(previous);
  }

  /**
   * Drop the current handle (process shutdown)
   */
  async unload(): Promise<void> {
    while (this.pendingReload) {
      await this.pendingReload.promise.then(() => undefined, () => undefined);
    }
    const previous = this.slot;
    this.slot = null;
    this.state = 'unloaded';
    this.lastError = null;
    this.errorCode = null;
    if (previous) {
      await this.retire(previous);
    }
  }

  getHandleState(): HandleState {
    const handle = this.slot?.handle ?? null;
    return {
      state: this.state,
      kind: handle?.kind ?? null,
      version: handle?.version ?? null,
      lastError: this.lastError,
      errorCode: this.errorCode
    };
  }

  isLoaded(): boolean {
    return this.state === 'loaded' && this.slot !== null;
  }

  status(): ModelStatus {
    const handle = this.slot?.handle ?? null;
    return {
      loaded: this.isLoaded(),
      detail: {
        ...this.getHandleState(),
        path: this.loader.modelPath,
        fileExists: this.loader.modelFileExists(),
        runtime: handle?.kind === 'real' ? handle.runtime : null,
        inputShape: handle?.inputShape ?? null,
        labels: DIAGNOSIS_LABELS.map(label => label.id),
        loadedAt: handle?.loadedAt ?? null
      }
    };
  }

  private async performReload(request: LoadRequest): Promise<HandleState> {
    const result = await this.loader.load(request);
    const previous = this.slot;

    if (result.success) {
      this.slot = { handle: result.data, leases: 0, retired: false };
      this.state = 'loaded';
      this.lastError = null;
      this.errorCode = null;
    } else {
      this.slot = null;
      this.state = 'failed';
      this.lastError = result.error.message;
      this.errorCode = result.error.code;
    }

    if (previous) {
      await this.retire(previous);
    }
    return this.getHandleState();
  }

  private async retire(slot: HandleSlot): Promise<void> {
    slot.retired = true;
    if (slot.leases === 0) {
      await this.releaseHandle(slot.handle);
    }
  }

  private async releaseHandle(handle: ModelHandle): Promise<void> {
    if (handle.kind !== 'real') {
      return;
    }
    try {
      await handle.session.release();
      console.log(`🧹 [MODEL] Released model session ${handle.id}`);
    } catch (error) {
      console.warn(`⚠️ [MODEL] Failed to release model session ${handle.id}:`, ErrorHandler.describe(error));
    }
  }
}
