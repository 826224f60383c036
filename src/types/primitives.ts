import type { AsnType } from "./asn_type";
import { ASN1Tag } from "./tag";
import type { GeneralizedTime } from "./time";

export enum PrimitiveCategory {
    Boolean = "Boolean",
    Integer = "Integer",
    OctetString = "OctetString",
    UTF8String = "UTF8String",
    Null = "Null",
    UTCTime = "UTCTime",
    GeneralizedTime = "GeneralizedTime",
}

const CATEGORY_TAGS = {
    [PrimitiveCategory.Boolean]: ASN1Tag.BOOLEAN,
    [PrimitiveCategory.Integer]: ASN1Tag.INTEGER,
    [PrimitiveCategory.OctetString]: ASN1Tag.OCTET_STRING,
    [PrimitiveCategory.UTF8String]: ASN1Tag.UTF8_STRING,
    [PrimitiveCategory.Null]: ASN1Tag.NULL,
    [PrimitiveCategory.UTCTime]: ASN1Tag.UTC_TIME,
    [PrimitiveCategory.GeneralizedTime]: ASN1Tag.GENERALIZED_TIME,
} as const satisfies Record<PrimitiveCategory, ASN1Tag>;

export type CategoryTag<C extends PrimitiveCategory> = (typeof CATEGORY_TAGS)[C];

/** A built-in JavaScript value type bound to one primitive category. */
export interface PrimitiveType<T, C extends PrimitiveCategory = PrimitiveCategory> extends AsnType<T, CategoryTag<C>> {
    readonly category: C;
    readonly name: string;
}

export interface IntegerType<T extends number | bigint> extends PrimitiveType<T, PrimitiveCategory.Integer> {
    /** Width in bits, or `null` for arbitrary precision. */
    readonly bits: number | null;
    readonly signed: boolean;
}

export function primitive<T, C extends PrimitiveCategory>(category: C, name: string): PrimitiveType<T, C> {
    return Object.freeze({ TAG: CATEGORY_TAGS[category], category, name });
}

function integer<T extends number | bigint>(name: string, bits: number | null, signed: boolean): IntegerType<T> {
    return Object.freeze({ ...primitive<T, PrimitiveCategory.Integer>(PrimitiveCategory.Integer, name), bits, signed });
}

export const ASN1Boolean = primitive<boolean, PrimitiveCategory.Boolean>(PrimitiveCategory.Boolean, "BOOLEAN");
export const ASN1OctetString = primitive<Uint8Array, PrimitiveCategory.OctetString>(PrimitiveCategory.OctetString, "OCTET STRING");
export const ASN1UTF8String = primitive<string, PrimitiveCategory.UTF8String>(PrimitiveCategory.UTF8String, "UTF8String");
export const ASN1Null = primitive<null, PrimitiveCategory.Null>(PrimitiveCategory.Null, "NULL");
export const ASN1UTCTime = primitive<Date, PrimitiveCategory.UTCTime>(PrimitiveCategory.UTCTime, "UTCTime");
export const ASN1GeneralizedTime = primitive<GeneralizedTime, PrimitiveCategory.GeneralizedTime>(
    PrimitiveCategory.GeneralizedTime,
    "GeneralizedTime"
);

// Every width shares the INTEGER tag; JavaScript numbers cover up to 32 bits.
export const ASN1Integer = integer<bigint>("INTEGER", null, true);
export const ASN1Int8 = integer<number>("i8", 8, true);
export const ASN1Int16 = integer<number>("i16", 16, true);
export const ASN1Int32 = integer<number>("i32", 32, true);
export const ASN1Int64 = integer<bigint>("i64", 64, true);
export const ASN1Int128 = integer<bigint>("i128", 128, true);
export const ASN1UInt8 = integer<number>("u8", 8, false);
export const ASN1UInt16 = integer<number>("u16", 16, false);
export const ASN1UInt32 = integer<number>("u32", 32, false);
export const ASN1UInt64 = integer<bigint>("u64", 64, false);
export const ASN1UInt128 = integer<bigint>("u128", 128, false);
