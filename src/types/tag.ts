import { ASN1Error, ErrorCode } from "../errors";

export enum TagClass {
    Universal = 0,
    Application = 1,
    ContextSpecific = 2,
    Private = 3,
}

const CLASS_LABELS: Record<TagClass, string> = {
    [TagClass.Universal]: "UNIVERSAL",
    [TagClass.Application]: "APPLICATION",
    [TagClass.ContextSpecific]: "CONTEXT",
    [TagClass.Private]: "PRIVATE",
};

/**
 * An ASN.1 tag: a class and a number. The number and class are kept as
 * literal types so that two different tags are two different types.
 */
export class ASN1Tag<N extends bigint = bigint, C extends TagClass = TagClass> {
    constructor(public readonly tagNumber: N, public readonly tagClass: C) {
        if (tagNumber < 0n) {
            throw ASN1Error.new(ErrorCode.InvalidTag, `Tag number must be non-negative, got ${tagNumber}`);
        }
        Object.freeze(this);
    }

    static universal<N extends bigint>(tagNumber: N): ASN1Tag<N, TagClass.Universal> {
        return new ASN1Tag(tagNumber, TagClass.Universal);
    }

    static application<N extends bigint>(tagNumber: N): ASN1Tag<N, TagClass.Application> {
        return new ASN1Tag(tagNumber, TagClass.Application);
    }

    static context<N extends bigint>(tagNumber: N): ASN1Tag<N, TagClass.ContextSpecific> {
        return new ASN1Tag(tagNumber, TagClass.ContextSpecific);
    }

    static privateUse<N extends bigint>(tagNumber: N): ASN1Tag<N, TagClass.Private> {
        return new ASN1Tag(tagNumber, TagClass.Private);
    }

    /** Identifier octet for tag numbers below 31, without the constructed bit. */
    shortForm(): number | null {
        if (this.tagNumber < 31n) {
            return Number(this.tagNumber) | (this.tagClass << 6);
        }
        return null;
    }

    isEndOfContents(): boolean {
        return this.equals(ASN1Tag.EOC);
    }

    equals(other: ASN1Tag): boolean {
        return this.tagNumber === other.tagNumber && this.tagClass === other.tagClass;
    }

    toString(): string {
        return `[${CLASS_LABELS[this.tagClass]} ${this.tagNumber}]`;
    }

    // Universal tags, X.680 numbering.
    // EOC is reserved by X.690 for end-of-contents and is never a type's tag,
    // so it marks types (CHOICE, open values) without a fixed tag.
    static readonly EOC = new ASN1Tag(0n, TagClass.Universal);
    static readonly BOOLEAN = new ASN1Tag(1n, TagClass.Universal);
    static readonly INTEGER = new ASN1Tag(2n, TagClass.Universal);
    static readonly BIT_STRING = new ASN1Tag(3n, TagClass.Universal);
    static readonly OCTET_STRING = new ASN1Tag(4n, TagClass.Universal);
    static readonly NULL = new ASN1Tag(5n, TagClass.Universal);
    static readonly OBJECT_IDENTIFIER = new ASN1Tag(6n, TagClass.Universal);
    static readonly EXTERNAL = new ASN1Tag(8n, TagClass.Universal);
    static readonly REAL = new ASN1Tag(9n, TagClass.Universal);
    static readonly ENUMERATED = new ASN1Tag(10n, TagClass.Universal);
    static readonly UTF8_STRING = new ASN1Tag(12n, TagClass.Universal);
    static readonly SEQUENCE = new ASN1Tag(16n, TagClass.Universal);
    static readonly SET = new ASN1Tag(17n, TagClass.Universal);
    static readonly NUMERIC_STRING = new ASN1Tag(18n, TagClass.Universal);
    static readonly PRINTABLE_STRING = new ASN1Tag(19n, TagClass.Universal);
    static readonly TELETEX_STRING = new ASN1Tag(20n, TagClass.Universal);
    static readonly VIDEOTEX_STRING = new ASN1Tag(21n, TagClass.Universal);
    static readonly IA5_STRING = new ASN1Tag(22n, TagClass.Universal);
    static readonly UTC_TIME = new ASN1Tag(23n, TagClass.Universal);
    static readonly GENERALIZED_TIME = new ASN1Tag(24n, TagClass.Universal);
    static readonly GRAPHIC_STRING = new ASN1Tag(25n, TagClass.Universal);
    static readonly VISIBLE_STRING = new ASN1Tag(26n, TagClass.Universal);
    static readonly GENERAL_STRING = new ASN1Tag(27n, TagClass.Universal);
    static readonly UNIVERSAL_STRING = new ASN1Tag(28n, TagClass.Universal);
    static readonly BMP_STRING = new ASN1Tag(30n, TagClass.Universal);
}
