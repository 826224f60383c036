import { Implicit } from "./prefix";
import { ASN1UTF8String } from "./primitives";
import { ASN1Tag } from "./tag";

// Restricted character string types, carried as JavaScript strings under
// their own universal tag. Character set checks belong to the codec.
export const ASN1IA5String = Implicit(ASN1Tag.IA5_STRING, ASN1UTF8String);
export const ASN1PrintableString = Implicit(ASN1Tag.PRINTABLE_STRING, ASN1UTF8String);
export const ASN1VisibleString = Implicit(ASN1Tag.VISIBLE_STRING, ASN1UTF8String);
export const ASN1BMPString = Implicit(ASN1Tag.BMP_STRING, ASN1UTF8String);
export const ASN1UniversalString = Implicit(ASN1Tag.UNIVERSAL_STRING, ASN1UTF8String);

export type ASN1IA5String = InstanceType<typeof ASN1IA5String>;
export type ASN1PrintableString = InstanceType<typeof ASN1PrintableString>;
export type ASN1VisibleString = InstanceType<typeof ASN1VisibleString>;
export type ASN1BMPString = InstanceType<typeof ASN1BMPString>;
export type ASN1UniversalString = InstanceType<typeof ASN1UniversalString>;
