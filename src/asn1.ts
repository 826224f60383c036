export { ASN1Error, ErrorCode } from "./errors";
export { ASN1Tag, TagClass } from "./types/tag";
export { hasFixedTag, isDynamicallyTagged, resolveTag } from "./types/asn_type";
export type { AsnType, DynamicallyTagged, TagOf, ValueOf } from "./types/asn_type";
export {
    ASN1Boolean,
    ASN1GeneralizedTime,
    ASN1Int128,
    ASN1Int16,
    ASN1Int32,
    ASN1Int64,
    ASN1Int8,
    ASN1Integer,
    ASN1Null,
    ASN1OctetString,
    ASN1UInt128,
    ASN1UInt16,
    ASN1UInt32,
    ASN1UInt64,
    ASN1UInt8,
    ASN1UTCTime,
    ASN1UTF8String,
    PrimitiveCategory,
    primitive,
} from "./types/primitives";
export type { CategoryTag, IntegerType, PrimitiveType } from "./types/primitives";
export { GeneralizedTime } from "./types/time";
export { ASN1BitString } from "./types/bit_string";
export { ASN1ConstOid, ASN1ObjectIdentifier } from "./types/object_identifier";
export type { Arc } from "./types/object_identifier";
export { Explicit, ExplicitPrefix, Implicit, ImplicitPrefix, PrefixKind, Prefixed, isPrefixType, tagChain } from "./types/prefix";
export type { ExplicitType, ImplicitType, PrefixType } from "./types/prefix";
export { ASN1BMPString, ASN1IA5String, ASN1PrintableString, ASN1UniversalString, ASN1VisibleString } from "./types/strings";
export { ArrayOf, MapOf, Optional, SequenceOf, SetOf, SliceOf, isOptionalType, isSequenceOf } from "./types/collections";
export type {
    ArrayOfType,
    IsSequenceOf,
    MapOfType,
    OptionalType,
    SequenceOfMarker,
    SequenceOfType,
    SetOfType,
    SliceOfType,
} from "./types/collections";
export { Choice, isChoiceType, possibleTags } from "./types/choice";
export type { Alternatives, ChoiceType, ChoiceValue } from "./types/choice";
export { ASN1Open, openTag } from "./types/open";
export type { OpenType, OpenValue } from "./types/open";
export { InstanceOf } from "./types/instance_of";
