import { z } from "zod";

import { InvalidArgumentError } from "../errors.js";
import { SNAPSHOT_VERSION, type NodeSnapshot, type TrieSnapshot } from "../snapshot.js";

/** Validates one symbol or one value; may transform its input. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const envelopeSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  root: z.unknown(),
});

const nodeSchema = z.object({
  payload: z.object({ value: z.unknown() }).optional(),
  count: z.number().int().nonnegative(),
  children: z.array(z.tuple([z.unknown(), z.unknown()])),
});

export function stringifySnapshot<S, V>(snapshot: TrieSnapshot<S, V>): string {
  return JSON.stringify(snapshot);
}

/**
 * Parses and shape-checks a serialized snapshot. Structural checks (counts,
 * empty nodes) happen when the snapshot is restored into a trie.
 */
export function parseSnapshot<S, V>(json: string, symbol: Schema<S>, value: Schema<V>): TrieSnapshot<S, V> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    throw new InvalidArgumentError(`snapshot is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const envelope = check(envelopeSchema, raw, "$");
  return { version: envelope.version, root: parseNode(envelope.root, symbol, value, "$.root") };
}

function parseNode<S, V>(raw: unknown, symbol: Schema<S>, value: Schema<V>, at: string): NodeSnapshot<S, V> {
  const data = check(nodeSchema, raw, at);
  const node: NodeSnapshot<S, V> = { count: data.count, children: [] };
  if (data.payload) {
    node.payload = { value: check(value, data.payload.value, `${at}.payload.value`) };
  }
  data.children.forEach(([sym, child], i) => {
    node.children.push([
      check(symbol, sym, `${at}.children[${i}][0]`),
      parseNode(child, symbol, value, `${at}.children[${i}][1]`),
    ]);
  });
  return node;
}

function check<T>(schema: Schema<T>, input: unknown, at: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `${at}.${issue.path.join(".")}` : at;
    throw new InvalidArgumentError(`invalid snapshot at ${where}: ${issue?.message ?? parsed.error.message}`);
  }
  return parsed.data;
}
