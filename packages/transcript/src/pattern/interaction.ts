import { utf8 } from "../utils/bytes.js";

export type Hierarchy = "Atomic" | "Begin" | "End";

export type Kind = "Protocol" | "Public" | "Message" | "Hint" | "Challenge";

export type Length =
  | { readonly type: "None" }
  | { readonly type: "Scalar" }
  | { readonly type: "Fixed"; readonly size: number }
  | { readonly type: "Dynamic" };

const NONE: Length = { type: "None" };
const SCALAR: Length = { type: "Scalar" };
const DYNAMIC: Length = { type: "Dynamic" };

export const Length = {
  None: NONE,
  Scalar: SCALAR,
  Dynamic: DYNAMIC,
  fixed: (size: number): Length => ({ type: "Fixed", size }),
};

export function lengthToString(length: Length): string {
  return length.type === "Fixed" ? `Fixed(${length.size})` : length.type;
}

function lengthEquals(a: Length, b: Length): boolean {
  if (a.type === "Fixed" && b.type === "Fixed") return a.size === b.size;
  return a.type === b.type;
}

/** One prover-verifier interaction, or the boundary of a group of them. */
export class Interaction {
  readonly hierarchy: Hierarchy;
  readonly kind: Kind;
  readonly label: string;
  /** Name of the value's type; checked on playback, left out of the domain string. */
  readonly typeName: string;
  readonly length: Length;

  constructor(hierarchy: Hierarchy, kind: Kind, label: string, length: Length, typeName = "") {
    this.hierarchy = hierarchy;
    this.kind = kind;
    this.label = label;
    this.length = length;
    this.typeName = typeName;
  }

  equals(other: Interaction): boolean {
    return (
      this.hierarchy === other.hierarchy &&
      this.kind === other.kind &&
      this.label === other.label &&
      this.typeName === other.typeName &&
      lengthEquals(this.length, other.length)
    );
  }

  /** True if this is the `End` matching the given `Begin`. */
  closes(begin: Interaction): boolean {
    return (
      this.hierarchy === "End" &&
      begin.hierarchy === "Begin" &&
      this.kind === begin.kind &&
      this.label === begin.label &&
      this.typeName === begin.typeName &&
      lengthEquals(this.length, begin.length)
    );
  }

  toString(): string {
    const parts = [this.hierarchy, this.kind, this.label, lengthToString(this.length)];
    if (this.typeName) parts.push(this.typeName);
    return parts.join(" ");
  }

  /** Stable form: labels are length-prefixed so no label can fake a field boundary. */
  toDomainString(): string {
    return `${this.hierarchy} ${this.kind} ${utf8(this.label).length} ${this.label} ${lengthToString(this.length)}`;
  }
}
