import type { AsnType } from "./asn_type";
import type { ASN1ObjectIdentifier } from "./object_identifier";
import type { OpenValue } from "./open";
import { ASN1Tag } from "./tag";

/**
 * INSTANCE OF: a value together with the OBJECT IDENTIFIER naming its type.
 * Encoded under the EXTERNAL tag.
 */
export class InstanceOf<T = OpenValue> {
    static readonly TAG = ASN1Tag.EXTERNAL;

    constructor(public readonly typeId: ASN1ObjectIdentifier, public readonly value: T) { }
}

InstanceOf satisfies AsnType<InstanceOf>;
