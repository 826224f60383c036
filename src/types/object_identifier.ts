import { ASN1Error, ErrorCode } from "../errors";
import type { AsnType } from "./asn_type";
import { ASN1Tag } from "./tag";

export type Arc = number | bigint;

const DECIMAL_ARC = /^(0|[1-9][0-9]*)$/;

abstract class ObjectIdentifierBase {
    static readonly TAG = ASN1Tag.OBJECT_IDENTIFIER;

    abstract readonly arcs: readonly bigint[];

    equals(other: ObjectIdentifierBase): boolean {
        return this.compare(other) === 0;
    }

    /** Arc-wise lexicographic order; a proper prefix sorts first. */
    compare(other: ObjectIdentifierBase): -1 | 0 | 1 {
        const shared = Math.min(this.arcs.length, other.arcs.length);
        for (let i = 0; i < shared; i++) {
            const a = this.arcs[i] ?? 0n;
            const b = other.arcs[i] ?? 0n;
            if (a !== b) {
                return a < b ? -1 : 1;
            }
        }
        if (this.arcs.length === other.arcs.length) return 0;
        return this.arcs.length < other.arcs.length ? -1 : 1;
    }

    toString(): string {
        return this.arcs.join(".");
    }
}

/**
 * An OBJECT IDENTIFIER built at runtime. Construction checks the X.660 arc
 * numbering rules and throws `InvalidOid` when they are violated.
 */
export class ASN1ObjectIdentifier extends ObjectIdentifierBase {
    readonly arcs: readonly bigint[];

    constructor(arcs: readonly Arc[]) {
        super();
        this.arcs = Object.freeze(ASN1ObjectIdentifier.validate(arcs));
    }

    static parse(dotted: string): ASN1ObjectIdentifier {
        const arcs = dotted.split(".").map((segment) => {
            if (!DECIMAL_ARC.test(segment)) {
                throw ASN1Error.new(ErrorCode.InvalidOid, `Invalid arc "${segment}" in "${dotted}"`);
            }
            return BigInt(segment);
        });
        return new ASN1ObjectIdentifier(arcs);
    }

    private static validate(arcs: readonly Arc[]): bigint[] {
        if (arcs.length < 2) {
            throw ASN1Error.new(ErrorCode.InvalidOid, `Must have at least 2 arcs, got ${arcs.length}`);
        }

        const normalized = arcs.map((arc) => {
            if (typeof arc === "number" && !Number.isSafeInteger(arc)) {
                throw ASN1Error.new(ErrorCode.InvalidOid, `Arc must be an integer, got ${arc}`);
            }
            const value = BigInt(arc);
            if (value < 0n) {
                throw ASN1Error.new(ErrorCode.InvalidOid, `Arc must be non-negative, got ${value}`);
            }
            return value;
        });

        const [first = 0n, second = 0n] = normalized;
        if (first > 2n) {
            throw ASN1Error.new(ErrorCode.InvalidOid, `First arc must be 0, 1, or 2, got ${first}`);
        }
        if (first < 2n && second > 39n) {
            throw ASN1Error.new(ErrorCode.InvalidOid, `Second arc must be <= 39 if first is 0 or 1, got ${second}`);
        }
        return normalized;
    }
}

/**
 * An OBJECT IDENTIFIER written out in source. The arcs are trusted and kept
 * as a literal tuple type, so the value can name a type or key a table.
 */
export class ASN1ConstOid<const Arcs extends readonly Arc[] = readonly Arc[]> extends ObjectIdentifierBase {
    readonly arcs: readonly bigint[];

    constructor(public readonly components: Arcs) {
        super();
        this.arcs = Object.freeze(components.map((arc) => BigInt(arc)));
        Object.freeze(this);
    }

    toOwned(): ASN1ObjectIdentifier {
        return new ASN1ObjectIdentifier(this.arcs);
    }
}

ASN1ObjectIdentifier satisfies AsnType<ASN1ObjectIdentifier>;
ASN1ConstOid satisfies AsnType<ASN1ConstOid>;
