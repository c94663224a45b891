import { InvalidConfigError } from '../shared/errors.js';
import type { JsonObject } from '../backend/store.js';
import type { UserLoader } from '../users/users.js';

/** Returning an object replaces the session data. */
export type StartHook = (
  clientData: JsonObject,
  serverData: JsonObject,
) => JsonObject | null | undefined | void | Promise<JsonObject | null | undefined | void>;

export type DisposeHook = () => void | Promise<void>;

export type InitialUrlHook = () => string;

/** Lab callbacks. Each one can be registered once. */
export class HookRegistry {
  private startHook?: StartHook;
  private disposeHook?: DisposeHook;
  private initialUrlHook?: InitialUrlHook;
  private loader?: UserLoader;

  get onStart(): StartHook | undefined {
    return this.startHook;
  }

  get onDispose(): DisposeHook | undefined {
    return this.disposeHook;
  }

  get initialUrl(): InitialUrlHook | undefined {
    return this.initialUrlHook;
  }

  get userLoader(): UserLoader | undefined {
    return this.loader;
  }

  setOnStart(hook: StartHook): void {
    if (this.startHook) throw new InvalidConfigError('onStart has already been defined');
    this.startHook = hook;
  }

  setOnDispose(hook: DisposeHook): void {
    if (this.disposeHook) throw new InvalidConfigError('onDispose has already been defined');
    this.disposeHook = hook;
  }

  setInitialUrl(hook: InitialUrlHook): void {
    if (this.initialUrlHook) throw new InvalidConfigError('initialUrl has already been defined');
    this.initialUrlHook = hook;
  }

  setUserLoader(loader: UserLoader): void {
    if (this.loader) throw new InvalidConfigError('A userLoader has already been registered');
    this.loader = loader;
  }
}
