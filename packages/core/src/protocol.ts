import type { z } from "zod";

import { createLogger, type Logger } from "@incta/logger";

import type { Candle } from "./candle.js";
import { FieldSetError, InvalidConfigError, ResultShapeError } from "./errors.js";
import { formatIssues, type FieldParsers, type FieldSetFailure, type FieldSetResult } from "./fields.js";
import { sameShape, type IndicatorResult, type ResultShape } from "./result.js";

/** Per-stream state produced when a configuration is bound to its first candle. */
export interface IndicatorState {
  next(candle: Candle): IndicatorResult;
}

/**
 * Everything the protocol needs to know about one indicator. Indicators
 * compose windows, methods and signal primitives inside `create`.
 */
export interface IndicatorDefinition<P extends object> {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly defaults: Readonly<P>;
  readonly fields: FieldParsers<P>;
  /** Parameter invariants, ordering constraints included. */
  readonly schema: z.ZodType<P>;
  readonly shape: ResultShape;
  readonly create: (params: Readonly<P>, candle: Candle) => IndicatorState;
}

export interface IndicatorConfigOptions {
  readonly logger?: Logger;
  /** Throw {@link FieldSetError} from `set` instead of logging and carrying on. */
  readonly strictFieldSet?: boolean;
}

const defaultLogger = createLogger("core/config");

const hasField = <P extends object>(
  fields: FieldParsers<P>,
  name: string,
): name is Extract<keyof P, string> => {
  return Object.prototype.hasOwnProperty.call(fields, name);
};

const withField = <P extends object, K extends keyof P>(params: P, key: K, value: P[K]): P => {
  const next = { ...params };
  next[key] = value;
  return next;
};

/**
 * Mutable parameter set for one indicator. Field updates are best-effort:
 * a bad name or value leaves the field unchanged and is reported, and
 * `validate()` is the gate before an instance can be built.
 */
export class IndicatorConfig<P extends object> {
  public readonly definition: IndicatorDefinition<P>;

  private readonly logger: Logger;
  private readonly strictFieldSet: boolean;
  private current: P;

  public constructor(
    definition: IndicatorDefinition<P>,
    overrides: Partial<P> = {},
    options: IndicatorConfigOptions = {},
  ) {
    this.definition = definition;
    this.logger = (options.logger ?? defaultLogger).child({ indicator: definition.name });
    this.strictFieldSet = options.strictFieldSet ?? false;
    this.current = { ...definition.defaults, ...overrides };
  }

  public get name(): string {
    return this.definition.name;
  }

  public get params(): Readonly<P> {
    return { ...this.current };
  }

  public validate(): boolean {
    return this.definition.schema.safeParse(this.current).success;
  }

  /** Human-readable reasons `validate()` fails; empty when valid. */
  public issues(): string[] {
    const parsed = this.definition.schema.safeParse(this.current);
    return parsed.success ? [] : formatIssues(parsed.error);
  }

  public size(): ResultShape {
    return { ...this.definition.shape };
  }

  /**
   * Parses `value` into the named field.
   *
   * @throws FieldSetError only when the config was created with `strictFieldSet`.
   */
  public set(name: string, value: string): FieldSetResult {
    const { fields } = this.definition;
    if (!hasField(fields, name)) {
      return this.reject("unknown_field", name, value, `unknown field "${name}"`);
    }

    const parsed = fields[name].safeParse(value);
    if (!parsed.success) {
      return this.reject("invalid_value", name, value, formatIssues(parsed.error).join("; "));
    }

    this.current = withField(this.current, name, parsed.data);
    return { ok: true, field: name };
  }

  /**
   * Applies every entry in insertion order and returns the rejected ones.
   */
  public setMany(values: Readonly<Record<string, string>>): FieldSetFailure[] {
    const failures: FieldSetFailure[] = [];
    for (const [name, value] of Object.entries(values)) {
      const result = this.set(name, value);
      if (!result.ok) {
        failures.push(result);
      }
    }
    return failures;
  }

  /**
   * Binds a snapshot of the current parameters to the first candle.
   *
   * @throws InvalidConfigError when the parameters do not validate.
   */
  public init(candle: Candle): IndicatorInstance<P> {
    const issues = this.issues();
    if (issues.length > 0) {
      throw new InvalidConfigError(this.name, issues);
    }
    return new IndicatorInstance(this.definition, Object.freeze({ ...this.current }), candle);
  }

  private reject(
    code: FieldSetFailure["code"],
    field: string,
    value: string,
    message: string,
  ): FieldSetFailure {
    const failure: FieldSetFailure = {
      ok: false,
      code,
      indicator: this.name,
      field,
      value,
      message,
    };
    if (this.strictFieldSet) {
      throw new FieldSetError(failure);
    }
    this.logger.warn("Ignoring field update", { field, value, code, reason: message });
    return failure;
  }
}

/**
 * A configuration bound to a stream. `next` is the only state transition.
 */
export class IndicatorInstance<P extends object> {
  private readonly definition: IndicatorDefinition<P>;
  private readonly params: Readonly<P>;
  private readonly state: IndicatorState;

  public constructor(definition: IndicatorDefinition<P>, params: Readonly<P>, candle: Candle) {
    this.definition = definition;
    this.params = params;
    this.state = definition.create(params, candle);
  }

  public get name(): string {
    return this.definition.name;
  }

  public config(): Readonly<P> {
    return this.params;
  }

  public size(): ResultShape {
    return { ...this.definition.shape };
  }

  /**
   * Feeds the next candle. Candles must arrive in chronological order.
   */
  public next(candle: Candle): IndicatorResult {
    const result = this.state.next(candle);
    if (!sameShape(result.shape, this.definition.shape)) {
      throw new ResultShapeError(this.name, this.definition.shape, result.shape);
    }
    return result;
  }
}
