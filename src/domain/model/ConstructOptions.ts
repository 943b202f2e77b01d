/** Per-call construction options. Unset values fall back to the schema's options, then to the library defaults. */
export interface ConstructOptions {
  /** When `true`, a `null`/`undefined` input builds a record from defaults; when `false` it yields `null`. Default: `true`. */
  readonly nilToEmpty?: boolean;
  /** When `true`, unknown input keys and absent required fields throw `KeyError`. Default: `false`. */
  readonly checkKeys?: boolean;
}

export type ResolvedConstructOptions = Required<ConstructOptions>;

export const DEFAULT_CONSTRUCT_OPTIONS: ResolvedConstructOptions = Object.freeze({
  nilToEmpty: true,
  checkKeys: false,
});

/** Merge call-site options over schema options over library defaults. */
export function resolveOptions(
  schemaOptions: ConstructOptions | undefined,
  callOptions: ConstructOptions | undefined,
): ResolvedConstructOptions {
  return {
    nilToEmpty: callOptions?.nilToEmpty ?? schemaOptions?.nilToEmpty ?? DEFAULT_CONSTRUCT_OPTIONS.nilToEmpty,
    checkKeys: callOptions?.checkKeys ?? schemaOptions?.checkKeys ?? DEFAULT_CONSTRUCT_OPTIONS.checkKeys,
  };
}
