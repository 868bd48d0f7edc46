/**
 * Canonical graph hashing.
 *
 * n3 neither orders its output nor keeps blank node labels stable across
 * parser runs, so two loads of the same file serialize differently. The
 * canonical form:
 * - drops graph names (a queryable element is one merged graph),
 * - colours each blank node by its neighbourhood, refining the colours
 *   until the partition they induce stops splitting,
 * - while several blank nodes share a colour, tries distinguishing each
 *   member of the first such class in turn and keeps the smallest result,
 * - relabels blank nodes c0, c1, ... in colour order, serializes each
 *   triple as N-Triples, dedupes, and sorts by code unit.
 *
 * The result depends only on the graph, never on insertion order or on
 * the labels the parser chose.
 */

import { DataFactory, Writer, type BlankNode, type Quad, type Store } from 'n3';
import { sha256Hex } from '../hash/contentHash.js';

const { blankNode } = DataFactory;

type Subject = Quad['subject'];
type Predicate = Quad['predicate'];
type ObjectTerm = Quad['object'];

interface Triple {
  subject: Subject;
  predicate: Predicate;
  object: ObjectTerm;
}

/** Blank node label → colour */
type Colouring = Map<string, string>;

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function tripleLine(writer: Writer, subject: Subject, predicate: Predicate, object: ObjectTerm): string {
  return writer.quadToString(subject, predicate, object).trimEnd();
}

function distinctColours(colours: Colouring): number {
  return new Set(colours.values()).size;
}

/**
 * Replace every blank node: the focus node by `_:self`, any other by
 * `name(label)`. Named nodes and literals are kept.
 */
function markTerm<T extends Subject | ObjectTerm>(
  term: T,
  focus: string,
  name: (label: string) => string
): T | BlankNode {
  if (term.termType !== 'BlankNode') {
    return term;
  }
  return blankNode(term.value === focus ? 'self' : name(term.value));
}

/**
 * Sorted triples around `node`, with the other blank nodes named by `name`.
 */
function neighbourhood(
  writer: Writer,
  node: string,
  triples: readonly Triple[],
  name: (label: string) => string
): string {
  return triples
    .map(({ subject, predicate, object }) =>
      tripleLine(writer, markTerm(subject, node, name), predicate, markTerm(object, node, name))
    )
    .sort(compareCodeUnits)
    .join('\n');
}

/**
 * Recolour until the number of distinct colours stops growing. A node's
 * new colour covers its old colour and its triples seen from it.
 */
function refine(writer: Writer, incident: Map<string, Triple[]>, start: Colouring): Colouring {
  let colours = start;
  let count = distinctColours(colours);

  for (;;) {
    const next: Colouring = new Map();
    const byColour = (label: string): string => `h${colours.get(label) ?? ''}`;
    for (const [node, triples] of incident) {
      next.set(node, sha256Hex(`${colours.get(node) ?? ''}\n${neighbourhood(writer, node, triples, byColour)}`));
    }

    const nextCount = distinctColours(next);
    colours = next;
    if (nextCount === count) {
      return colours;
    }
    count = nextCount;
  }
}

function serialize(writer: Writer, triples: readonly Triple[], colours: Colouring): string[] {
  const order = [...colours.entries()].sort((a, b) => compareCodeUnits(a[1], b[1]));
  const labels = new Map(order.map(([node], index): [string, string] => [node, `c${index}`]));

  const relabel = <T extends Subject | ObjectTerm>(term: T): T | BlankNode =>
    term.termType === 'BlankNode' ? blankNode(labels.get(term.value) ?? term.value) : term;

  const lines = new Set<string>();
  for (const { subject, predicate, object } of triples) {
    lines.add(tripleLine(writer, relabel(subject), predicate, relabel(object)));
  }
  return [...lines].sort(compareCodeUnits);
}

/**
 * The first colour class (in colour order) with more than one member.
 */
function firstTiedClass(colours: Colouring): string[] | undefined {
  const classes = new Map<string, string[]>();
  for (const [node, colour] of colours) {
    const members = classes.get(colour);
    if (members === undefined) {
      classes.set(colour, [node]);
    } else {
      members.push(node);
    }
  }

  const tied = [...classes.entries()]
    .filter(([, members]) => members.length > 1)
    .sort((a, b) => compareCodeUnits(a[0], b[0]));
  return tied[0]?.[1];
}

function search(
  writer: Writer,
  triples: readonly Triple[],
  incident: Map<string, Triple[]>,
  start: Colouring
): string[] {
  const colours = refine(writer, incident, start);
  const tied = firstTiedClass(colours);
  if (tied === undefined) {
    return serialize(writer, triples, colours);
  }

  // twins (same triples up to swapping the two) give the same result
  const byLabel = (label: string): string => `b${label}`;
  const seen = new Set<string>();
  const representatives = tied.filter(node => {
    const key = neighbourhood(writer, node, incident.get(node) ?? [], byLabel);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });

  let best: string[] | undefined;
  let bestText = '';
  for (const node of representatives) {
    const individualized = new Map(colours);
    individualized.set(node, sha256Hex(`${colours.get(node) ?? ''}*`));
    const candidate = search(writer, triples, incident, individualized);
    const text = candidate.join('\n');
    if (best === undefined || compareCodeUnits(text, bestText) < 0) {
      best = candidate;
      bestText = text;
    }
  }
  return best ?? serialize(writer, triples, colours);
}

/**
 * Canonical, sorted N-Triples lines for a set of quads.
 */
export function canonicalTriples(quads: Iterable<Quad>): string[] {
  const writer = new Writer({ format: 'N-Triples' });
  const unique = new Map<string, Triple>();
  for (const { subject, predicate, object } of quads) {
    unique.set(tripleLine(writer, subject, predicate, object), { subject, predicate, object });
  }
  const triples = [...unique.values()];

  const incident = new Map<string, Triple[]>();
  const touch = (term: Subject | ObjectTerm, triple: Triple): void => {
    if (term.termType !== 'BlankNode') {
      return;
    }
    const list = incident.get(term.value);
    if (list === undefined) {
      incident.set(term.value, [triple]);
    } else if (list[list.length - 1] !== triple) {
      list.push(triple);
    }
  };
  for (const triple of triples) {
    touch(triple.subject, triple);
    touch(triple.object, triple);
  }

  const initial: Colouring = new Map([...incident.keys()].map((node): [string, string] => [node, '']));
  return search(writer, triples, incident, initial);
}

/**
 * SHA-256 hex digest of the canonical serialization of a store.
 */
export function computeGraphHash(store: Store): string {
  const lines = canonicalTriples(store.getQuads(null, null, null, null));
  return sha256Hex(lines.join('\n'));
}
