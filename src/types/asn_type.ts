import type { ASN1Tag } from "./tag";

declare const valueType: unique symbol;

interface Phantom<T> {
    readonly value: T;
}

/**
 * Anything representable in ASN.1. A type declares exactly one tag, fixed
 * when the type is defined.
 *
 * Descriptors carry their value type `T` as a phantom; classes satisfy the
 * contract through a static `TAG` and their instances are the values.
 *
 * Types without a fixed tag (CHOICE, open values) declare `ASN1Tag.EOC`
 * and implement {@link DynamicallyTagged}.
 */
export interface AsnType<T = unknown, Tag extends ASN1Tag = ASN1Tag> {
    readonly TAG: Tag;
    readonly [valueType]?: Phantom<T>;
}

export interface DynamicallyTagged<T> {
    tagOf(value: T): ASN1Tag;
}

export type TagOf<A extends AsnType> = A["TAG"];

export type ValueOf<A extends AsnType> = A extends abstract new (...args: never[]) => infer I
    ? I
    : A extends AsnType<infer T>
      ? T
      : never;

export function hasFixedTag(type: AsnType): boolean {
    return !type.TAG.isEndOfContents();
}

export function isDynamicallyTagged(type: AsnType): type is AsnType & DynamicallyTagged<unknown> {
    return "tagOf" in type && typeof type.tagOf === "function";
}

/**
 * The tag a value of `type` is identified by on the wire.
 */
export function resolveTag<A extends AsnType>(type: A, value: ValueOf<A>): ASN1Tag {
    return tagOfValue(type, value);
}

/** Untyped form of {@link resolveTag}, for callers holding heterogeneous types. */
export function tagOfValue(type: AsnType, value: unknown): ASN1Tag {
    if (isDynamicallyTagged(type)) {
        return type.tagOf(value);
    }
    return type.TAG;
}
