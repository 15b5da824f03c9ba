/**
 * Path Navigator
 *
 * Resolves an explicit path of field names and list indices to the value
 * stored there. Every failure is a distinct NavigationError subclass.
 */

import {
  AbsentValueError,
  IndexExpectedError,
  IndexOutOfRangeError,
  MalformedPathError,
  UnknownFieldError,
} from "./errors.js";
import { TreeNode, hasKey, isStringMap } from "./node.js";
import type { FieldValue } from "./node.js";
import type { PathSegment } from "./types.js";

export function objectAtPath(
  root: TreeNode,
  path: readonly unknown[]
): FieldValue {
  let current: FieldValue = root;
  const walked: PathSegment[] = [];

  for (let position = 0; position < path.length; position++) {
    const token = path[position];
    if (typeof token !== "string" && typeof token !== "number") {
      throw new MalformedPathError(position, [...walked]);
    }
    walked.push(token);
    current = step(current, token, walked);
    if (current === null) {
      throw new AbsentValueError([...walked]);
    }
  }

  return current;
}

function step(
  current: FieldValue,
  token: PathSegment,
  walked: PathSegment[]
): FieldValue {
  if (current instanceof TreeNode) {
    if (typeof token !== "string" || !current.descriptor.has(token)) {
      throw new UnknownFieldError(
        String(token),
        [...walked],
        current.descriptor.key
      );
    }
    return current.get(token);
  }

  if (Array.isArray(current)) {
    if (typeof token !== "number" || !Number.isInteger(token)) {
      throw new IndexExpectedError(token, [...walked]);
    }
    if (token < 0 || token >= current.length) {
      throw new IndexOutOfRangeError(token, current.length, [...walked]);
    }
    return current[token];
  }

  if (isStringMap(current)) {
    const key = String(token);
    if (!hasKey(current, key)) {
      throw new UnknownFieldError(key, [...walked]);
    }
    return current[key];
  }

  // scalars have no fields
  throw new UnknownFieldError(String(token), [...walked]);
}
