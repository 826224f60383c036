import { ASN1Error, ErrorCode } from "../errors";
import { tagOfValue, type AsnType, type DynamicallyTagged, type TagOf, type ValueOf } from "./asn_type";
import { ASN1Tag } from "./tag";

/**
 * Marks types encoded as a repetition of one element type (SEQUENCE OF).
 * Sets and maps are not marked even though a map shares the SEQUENCE tag.
 */
export interface SequenceOfMarker<Element extends AsnType = AsnType> {
    readonly sequenceOf: true;
    readonly element: Element;
}

export type IsSequenceOf<A extends AsnType> = A extends SequenceOfMarker ? true : false;

export interface SequenceOfType<E extends AsnType>
    extends AsnType<ValueOf<E>[], typeof ASN1Tag.SEQUENCE>, SequenceOfMarker<E> { }

export interface ArrayOfType<E extends AsnType, N extends number>
    extends AsnType<ValueOf<E>[], typeof ASN1Tag.SEQUENCE>, SequenceOfMarker<E> {
    readonly length: N;
}

export interface SliceOfType<E extends AsnType>
    extends AsnType<readonly ValueOf<E>[], typeof ASN1Tag.SEQUENCE>, SequenceOfMarker<E> { }

export interface SetOfType<E extends AsnType> extends AsnType<Set<ValueOf<E>>, typeof ASN1Tag.SET> {
    readonly element: E;
}

export interface MapOfType<K, V extends AsnType> extends AsnType<Map<K, ValueOf<V>>, typeof ASN1Tag.SEQUENCE> {
    readonly value: V;
}

export interface OptionalType<T extends AsnType>
    extends AsnType<ValueOf<T> | undefined, TagOf<T>>, DynamicallyTagged<ValueOf<T> | undefined> {
    readonly optional: true;
    readonly inner: T;
}

export function isSequenceOf(type: AsnType): type is AsnType & SequenceOfMarker {
    return "sequenceOf" in type && type.sequenceOf === true;
}

export function isOptionalType(type: AsnType): type is OptionalType<AsnType> {
    return "optional" in type && type.optional === true && "inner" in type;
}

export function SequenceOf<E extends AsnType>(element: E): SequenceOfType<E> {
    return Object.freeze({ TAG: ASN1Tag.SEQUENCE, sequenceOf: true, element });
}

/** A fixed-size SEQUENCE OF with exactly `length` elements. */
export function ArrayOf<E extends AsnType, N extends number>(element: E, length: N): ArrayOfType<E, N> {
    if (!Number.isSafeInteger(length) || length < 0) {
        throw ASN1Error.new(ErrorCode.ValueOutOfRange, `Array length must be a non-negative integer, got ${length}`);
    }
    return Object.freeze({ TAG: ASN1Tag.SEQUENCE, sequenceOf: true, element, length });
}

/** A SEQUENCE OF over a borrowed, read-only view. */
export function SliceOf<E extends AsnType>(element: E): SliceOfType<E> {
    return Object.freeze({ TAG: ASN1Tag.SEQUENCE, sequenceOf: true, element });
}

/**
 * A SET OF. Its value is a JavaScript `Set`, which compares objects by
 * identity: two distinct `ASN1ObjectIdentifier`s with equal arcs are both
 * kept, so encoders must drop value-equal duplicates themselves.
 */
export function SetOf<E extends AsnType>(element: E): SetOfType<E> {
    return Object.freeze({ TAG: ASN1Tag.SET, element });
}

/**
 * Key-unique associations, encoded as a SEQUENCE. Keys need not be
 * representable, so their type is only named: `MapOf<typeof V, string>(V)`.
 */
export function MapOf<V extends AsnType, K = unknown>(value: V): MapOfType<K, V> {
    return Object.freeze({ TAG: ASN1Tag.SEQUENCE, value });
}

/** An absent value keeps the inner type's tag; optionality never changes identity. */
export function Optional<T extends AsnType>(inner: T): OptionalType<T> {
    return Object.freeze({
        TAG: inner.TAG,
        optional: true,
        inner,
        tagOf(value: ValueOf<T> | undefined): ASN1Tag {
            return value === undefined ? inner.TAG : tagOfValue(inner, value);
        },
    });
}
