import type { AsnType, DynamicallyTagged } from "./asn_type";
import type { ASN1BitString } from "./bit_string";
import { InstanceOf } from "./instance_of";
import type { ASN1ObjectIdentifier } from "./object_identifier";
import { ASN1Tag } from "./tag";
import type { GeneralizedTime } from "./time";

/**
 * A value of a type not known until it is decoded (ANY, open types).
 * `Unknown` carries raw content under whatever tag it arrived with.
 */
export type OpenValue =
    | { readonly type: "BitString"; readonly value: ASN1BitString }
    | { readonly type: "Boolean"; readonly value: boolean }
    | { readonly type: "Integer"; readonly value: bigint }
    | { readonly type: "Null"; readonly value: null }
    | { readonly type: "ObjectIdentifier"; readonly value: ASN1ObjectIdentifier }
    | { readonly type: "OctetString"; readonly value: Uint8Array }
    | { readonly type: "UTF8String"; readonly value: string }
    | { readonly type: "IA5String"; readonly value: string }
    | { readonly type: "PrintableString"; readonly value: string }
    | { readonly type: "VisibleString"; readonly value: string }
    | { readonly type: "BMPString"; readonly value: string }
    | { readonly type: "UniversalString"; readonly value: string }
    | { readonly type: "UTCTime"; readonly value: Date }
    | { readonly type: "GeneralizedTime"; readonly value: GeneralizedTime }
    | { readonly type: "InstanceOf"; readonly value: InstanceOf<OpenValue> }
    | { readonly type: "Unknown"; readonly tag: ASN1Tag; readonly value: Uint8Array };

type KnownOpenType = Exclude<OpenValue["type"], "Unknown">;

const OPEN_TAGS = {
    BitString: ASN1Tag.BIT_STRING,
    Boolean: ASN1Tag.BOOLEAN,
    Integer: ASN1Tag.INTEGER,
    Null: ASN1Tag.NULL,
    ObjectIdentifier: ASN1Tag.OBJECT_IDENTIFIER,
    OctetString: ASN1Tag.OCTET_STRING,
    UTF8String: ASN1Tag.UTF8_STRING,
    IA5String: ASN1Tag.IA5_STRING,
    PrintableString: ASN1Tag.PRINTABLE_STRING,
    VisibleString: ASN1Tag.VISIBLE_STRING,
    BMPString: ASN1Tag.BMP_STRING,
    UniversalString: ASN1Tag.UNIVERSAL_STRING,
    UTCTime: ASN1Tag.UTC_TIME,
    GeneralizedTime: ASN1Tag.GENERALIZED_TIME,
    InstanceOf: InstanceOf.TAG,
} as const satisfies Record<KnownOpenType, ASN1Tag>;

export function openTag(value: OpenValue): ASN1Tag {
    return value.type === "Unknown" ? value.tag : OPEN_TAGS[value.type];
}

export interface OpenType extends AsnType<OpenValue, typeof ASN1Tag.EOC>, DynamicallyTagged<OpenValue> { }

export const ASN1Open: OpenType = Object.freeze({
    TAG: ASN1Tag.EOC,
    tagOf: openTag,
});
