/**
 * timeshift/tagged-error (internal)
 *
 * Base class for errors carrying a `_tag` discriminant, so a union of
 * them can be narrowed with a plain `switch (error._tag)`.
 *
 * @example
 * ```typescript
 * class OutOfRange extends TaggedError<"OutOfRange"> {
 *   readonly _tag = "OutOfRange";
 *   constructor(readonly value: number) {
 *     super(`OutOfRange: ${value}`);
 *   }
 * }
 *
 * const error = new OutOfRange(42);
 * TaggedError.isTaggedError(error); // true
 * error._tag; // 'OutOfRange'
 * ```
 */

export abstract class TaggedError<Tag extends string = string> extends Error {
  abstract readonly _tag: Tag;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Check whether a value is any tagged error.
   */
  static isTaggedError(value: unknown): value is TaggedError {
    return value instanceof TaggedError;
  }

  /**
   * Check whether a value is a tagged error with the given tag.
   */
  static is<Tag extends string>(value: unknown, tag: Tag): value is TaggedError<Tag> {
    return TaggedError.isTaggedError(value) && value._tag === tag;
  }
}

/** Extract the `_tag` literal of a tagged error type. */
export type TagOf<E extends TaggedError> = E["_tag"];

/** Select a variant of a tagged error union by its tag. */
export type ErrorByTag<E extends TaggedError, Tag extends TagOf<E>> = Extract<E, { _tag: Tag }>;
