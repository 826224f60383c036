import { hasFixedTag, tagOfValue, type AsnType, type ValueOf } from "./asn_type";
import { isOptionalType } from "./collections";
import { ASN1Tag } from "./tag";

export enum PrefixKind {
    Implicit = "IMPLICIT",
    Explicit = "EXPLICIT",
}

/**
 * A value re-tagged by a prefix. The wrapper owns `value`; the tag lives on
 * the wrapper's class, not on the instance.
 */
export abstract class Prefixed<Tag extends ASN1Tag, Inner extends AsnType> {
    constructor(public readonly value: ValueOf<Inner>) { }

    abstract get tag(): Tag;
    abstract get inner(): Inner;
    abstract get kind(): PrefixKind;
}

export abstract class ImplicitPrefix<Tag extends ASN1Tag, Inner extends AsnType> extends Prefixed<Tag, Inner> {
    get kind(): PrefixKind.Implicit {
        return PrefixKind.Implicit;
    }
}

export abstract class ExplicitPrefix<Tag extends ASN1Tag, Inner extends AsnType> extends Prefixed<Tag, Inner> {
    get kind(): PrefixKind.Explicit {
        return PrefixKind.Explicit;
    }

    /** Tag of the nested payload, which an explicit prefix keeps on the wire. */
    get innerTag(): ASN1Tag {
        return tagOfValue(this.inner, this.value);
    }
}

export interface PrefixType<Kind extends PrefixKind, Tag extends ASN1Tag, Inner extends AsnType, P>
    extends AsnType<P, Tag> {
    readonly INNER: Inner;
    readonly KIND: Kind;
    new (value: ValueOf<Inner>): P;
}

export type ImplicitType<Tag extends ASN1Tag, Inner extends AsnType> = PrefixType<
    PrefixKind.Implicit,
    Tag,
    Inner,
    ImplicitPrefix<Tag, Inner>
>;

export type ExplicitType<Tag extends ASN1Tag, Inner extends AsnType> = PrefixType<
    PrefixKind.Explicit,
    Tag,
    Inner,
    ExplicitPrefix<Tag, Inner>
>;

/** An `Implicit(tag, inner)` value. */
export type Implicit<Tag extends ASN1Tag, Inner extends AsnType> = ImplicitPrefix<Tag, Inner>;
/** An `Explicit(tag, inner)` value. */
export type Explicit<Tag extends ASN1Tag, Inner extends AsnType> = ExplicitPrefix<Tag, Inner>;

/**
 * IMPLICIT tagging: `tag` replaces the tag of `inner` entirely.
 *
 * @example
 * const Version = Implicit(ASN1Tag.context(0n), ASN1Integer);
 * new Version(2n);
 */
export function Implicit<Tag extends ASN1Tag, Inner extends AsnType>(tag: Tag, inner: Inner): ImplicitType<Tag, Inner> {
    return Object.freeze(
        class extends ImplicitPrefix<Tag, Inner> {
            static readonly TAG = tag;
            static readonly INNER = inner;
            static readonly KIND = PrefixKind.Implicit;

            get tag(): Tag {
                return tag;
            }

            get inner(): Inner {
                return inner;
            }
        }
    );
}

/**
 * EXPLICIT tagging: `tag` is added around the value, whose own tag is kept
 * as the identity of the nested payload.
 */
export function Explicit<Tag extends ASN1Tag, Inner extends AsnType>(tag: Tag, inner: Inner): ExplicitType<Tag, Inner> {
    return Object.freeze(
        class extends ExplicitPrefix<Tag, Inner> {
            static readonly TAG = tag;
            static readonly INNER = inner;
            static readonly KIND = PrefixKind.Explicit;

            get tag(): Tag {
                return tag;
            }

            get inner(): Inner {
                return inner;
            }
        }
    );
}

export function isPrefixType(type: AsnType): type is PrefixType<PrefixKind, ASN1Tag, AsnType, unknown> {
    return "KIND" in type && "INNER" in type && (type.KIND === PrefixKind.Implicit || type.KIND === PrefixKind.Explicit);
}

/**
 * Tags an encoder writes for `type`, outermost first. An explicit prefix adds
 * a layer; an implicit prefix replaces the outermost tag of its inner type.
 * Optional types contribute their inner chain. A type without a fixed tag
 * (CHOICE, open values) ends the chain: its tag depends on the value and is
 * found with `resolveTag`.
 */
export function tagChain(type: AsnType): ASN1Tag[] {
    if (isOptionalType(type)) {
        return tagChain(type.inner);
    }
    if (!isPrefixType(type)) {
        return hasFixedTag(type) ? [type.TAG] : [];
    }
    const inner = tagChain(type.INNER);
    return type.KIND === PrefixKind.Explicit ? [type.TAG, ...inner] : [type.TAG, ...inner.slice(1)];
}
