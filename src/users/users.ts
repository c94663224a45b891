import { createHash } from 'node:crypto';
import { currentTimestamp } from '../shared/time.js';
import type {
  ExpiredSessionFields,
  JsonObject,
  JsonValue,
  SessionFields,
  StoredUser,
} from '../backend/store.js';

/** Lab-supplied lookup of the application's own user object. */
export type UserLoader = (usernameUnique: string) => unknown;

function hashData(data: JsonObject): string {
  return createHash('sha256').update(JSON.stringify(data)).digest('hex');
}

function deepFreeze<T extends JsonValue>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function frozenCopy(data: JsonObject): Readonly<JsonObject> {
  return deepFreeze(structuredClone(data));
}

export class AnonymousUser {
  readonly kind = 'anonymous';
  readonly active = false;
  readonly isAnonymous = true;
  readonly locale = null;

  get data(): JsonObject {
    throw new TypeError('Anonymous users have no data');
  }

  toString(): string {
    return 'Anonymous user';
  }
}

/** Fields shared by current and expired users. */
abstract class IdentifiedUser<F extends Omit<SessionFields, 'lastPoll' | 'exited'>> {
  readonly isAnonymous = false;

  constructor(
    protected readonly fields: F,
    private readonly loader: UserLoader | undefined,
  ) {}

  get sessionId(): string {
    return this.fields.sessionId;
  }

  get back(): string {
    return this.fields.back;
  }

  get maxDate(): number {
    return this.fields.maxDate;
  }

  get startDate(): number {
    return this.fields.startDate;
  }

  get username(): string {
    return this.fields.username;
  }

  get usernameUnique(): string {
    return this.fields.usernameUnique;
  }

  get fullName(): string {
    return this.fields.fullName;
  }

  get locale(): string | null {
    return this.fields.locale;
  }

  get experimentName(): string {
    return this.fields.experimentName;
  }

  get categoryName(): string {
    return this.fields.categoryName;
  }

  get experimentId(): string {
    return this.fields.experimentId;
  }

  get requestClientData(): Readonly<JsonObject> {
    return frozenCopy(this.fields.requestClientData);
  }

  get requestServerData(): Readonly<JsonObject> {
    return frozenCopy(this.fields.requestServerData);
  }

  /**
   * The lab's own user object for `usernameUnique`, or null when no loader is
   * registered. Loader errors propagate.
   */
  async loadUser(): Promise<unknown> {
    if (!this.loader) return null;
    return this.loader(this.fields.usernameUnique);
  }
}

export class CurrentUser extends IdentifiedUser<SessionFields> {
  readonly kind = 'current';

  private currentData: JsonObject;
  private storedHash: string;

  constructor(fields: SessionFields, loader?: UserLoader) {
    super(fields, loader);
    this.currentData = fields.data;
    this.storedHash = hashData(fields.data);
  }

  get active(): boolean {
    return !this.fields.exited;
  }

  get exited(): boolean {
    return this.fields.exited;
  }

  get lastPoll(): number {
    return this.fields.lastPoll;
  }

  get data(): JsonObject {
    return this.currentData;
  }

  /** Replaces the data; it counts as modified until it is stored. */
  set data(value: JsonObject) {
    this.currentData = value;
  }

  /** Seconds until `maxDate`, 0 once it has passed. */
  get timeLeft(): number {
    return Math.max(0, this.fields.maxDate - currentTimestamp());
  }

  get timeWithoutPolling(): number {
    return currentTimestamp() - this.fields.lastPoll;
  }

  isDataModified(): boolean {
    return hashData(this.currentData) !== this.storedHash;
  }

  markDataStored(): void {
    this.storedHash = hashData(this.currentData);
  }

  /** The record written when this session is disposed. */
  toExpiredFields(): ExpiredSessionFields {
    const { lastPoll: _lastPoll, exited: _exited, ...rest } = this.fields;
    return { ...structuredClone(rest), data: structuredClone(this.currentData), disposingResources: true };
  }

  toString(): string {
    return `Current user (id: ${this.sessionId}): ${this.username} (${this.usernameUnique}), ${this.fullName}, ` +
      `time left ${this.timeLeft.toFixed(1)}s, data ${JSON.stringify(this.currentData)}`;
  }
}

export class ExpiredUser extends IdentifiedUser<ExpiredSessionFields> {
  readonly kind = 'expired';
  readonly active = false;
  readonly timeLeft = 0;

  private readonly frozenData: Readonly<JsonObject>;

  constructor(fields: ExpiredSessionFields, loader?: UserLoader) {
    super(fields, loader);
    this.frozenData = frozenCopy(fields.data);
  }

  get disposingResources(): boolean {
    return this.fields.disposingResources;
  }

  /** Read-only snapshot; writing to it throws a TypeError. */
  get data(): Readonly<JsonObject> {
    return this.frozenData;
  }

  set data(_value: Readonly<JsonObject>) {
    throw new TypeError('Expired user data cannot be modified');
  }

  toString(): string {
    return `Expired user (id: ${this.sessionId}): ${this.username} (${this.usernameUnique}), ${this.fullName}, ` +
      `disposing resources: ${this.disposingResources}, data ${JSON.stringify(this.frozenData)}`;
  }
}

export type WeblabUser = AnonymousUser | CurrentUser | ExpiredUser;

export function toWeblabUser(stored: StoredUser, loader?: UserLoader): WeblabUser {
  switch (stored.kind) {
    case 'current':
      return new CurrentUser(stored.fields, loader);
    case 'expired':
      return new ExpiredUser(stored.fields, loader);
    case 'anonymous':
      return new AnonymousUser();
  }
}
