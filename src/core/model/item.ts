/**
 * Item value helpers. Items are never mutated in place: every helper
 * returns a new item, leaving its argument untouched.
 */

import type { Item, ItemPatch, RelationType, Relations } from '../../types/item.js';
import { ExitCode } from '../../types/exit-codes.js';
import { PlotlineError } from '../errors.js';
import { isRelationType } from './registry.js';
import { zeroDuration } from './duration.js';

const ITEM_ID = /^[A-Za-z0-9_]+$/;
const TAG = /^[a-z0-9_]+$/;
const LINE_BREAK = /[\r\n]/;
/** Where the item line would end the user comment and start the auto comment. */
const AUTO_COMMENT_START = /(^|\s)###/;

export function isValidItemId(id: string): boolean {
  return ITEM_ID.test(id);
}

export function isValidTag(tag: string): boolean {
  return TAG.test(tag);
}

function invalidComment(message: string): PlotlineError {
  return new PlotlineError(ExitCode.INVALID_INPUT, message, {
    fix: 'Keep comments on one line; `###` may only start the auto comment',
  });
}

/**
 * Trim both comments and drop empty ones, so the item reads back from its
 * line unchanged.
 * @throws PlotlineError (INVALID_INPUT) for a line break in either comment,
 *   or a `###` marker in the user comment
 */
function withCheckedComments(item: Item): Item {
  const { userComment, autoComment, ...rest } = item;
  const user = userComment?.trim() ?? '';
  const auto = autoComment?.trim() ?? '';
  if (LINE_BREAK.test(user) || LINE_BREAK.test(auto)) {
    throw invalidComment(`Comment of '${item.id}' contains a line break`);
  }
  if (AUTO_COMMENT_START.test(user)) {
    throw invalidComment(`User comment of '${item.id}' contains the auto comment marker '###'`);
  }
  return {
    ...rest,
    ...(user !== '' && { userComment: user }),
    ...(auto !== '' && { autoComment: auto }),
  };
}

/** Build an item, filling every field not given with its empty value. */
export function createItem(fields: Pick<Item, 'id' | 'title'> & Partial<Item>): Item {
  return withCheckedComments({
    description: '',
    status: 'NOT_STARTED',
    priority: 'NEUTRAL',
    duration: zeroDuration(),
    charts: [],
    tags: [],
    relations: {},
    timeConstraints: [],
    occlude: false,
    ...fields,
  });
}

/** Deep value copy. */
export function cloneItem(item: Item): Item {
  return structuredClone(item);
}

/** Copy-on-write field replacement. Identity and relations are not patchable. */
export function updateItem(item: Item, patch: ItemPatch): Item {
  return withCheckedComments({ ...cloneItem(item), ...structuredClone(patch) });
}

/** Targets of one relation bucket; empty when the bucket is absent. */
export function relationTargets(item: Item, type: RelationType): readonly string[] {
  return item.relations[type] ?? [];
}

/** Every non-empty relation bucket, in the order the buckets were created. */
export function relationEntries(item: Item): Array<[RelationType, string[]]> {
  const entries: Array<[RelationType, string[]]> = [];
  for (const key of Object.keys(item.relations)) {
    if (!isRelationType(key)) continue;
    const targets = item.relations[key];
    if (targets && targets.length > 0) entries.push([key, targets]);
  }
  return entries;
}

function withBucket(item: Item, type: RelationType, targets: string[]): Item {
  const relations: Relations = { ...item.relations };
  if (targets.length > 0) {
    relations[type] = targets;
  } else {
    delete relations[type];
  }
  return { ...item, relations };
}

/** Append `target` to a bucket unless already present. */
export function withRelationTarget(item: Item, type: RelationType, target: string): Item {
  const current = relationTargets(item, type);
  if (current.includes(target)) return item;
  return withBucket(item, type, [...current, target]);
}

/** Drop `target` from a bucket, removing the bucket once empty. */
export function withoutRelationTarget(item: Item, type: RelationType, target: string): Item {
  const current = relationTargets(item, type);
  if (!current.includes(target)) return item;
  return withBucket(item, type, current.filter((id) => id !== target));
}

/**
 * Put `next` where `previous` stood in a bucket. Appends `next` when
 * `previous` is absent; never introduces a duplicate.
 */
export function replaceRelationTarget(item: Item, type: RelationType, previous: string, next: string): Item {
  const current = relationTargets(item, type);
  const index = current.indexOf(previous);
  if (index === -1) return withRelationTarget(item, type, next);
  const replaced = current.map((id, i) => (i === index ? next : id));
  return withBucket(item, type, replaced.filter((id, i) => replaced.indexOf(id) === i));
}
