import { describe, expect, test } from "vitest";
import {
    ASN1BitString,
    ASN1ObjectIdentifier,
    ASN1Open,
    ASN1Tag,
    GeneralizedTime,
    InstanceOf,
    Optional,
    hasFixedTag,
    openTag,
    resolveTag,
    type OpenValue,
} from "../src/asn1";

describe("Open values and INSTANCE OF", () => {
    test("test_open_defers_tag_to_content", () => {
        expect(ASN1Open.TAG).toBe(ASN1Tag.EOC);
        expect(hasFixedTag(ASN1Open)).toBe(false);
    });

    test("test_open_tag_by_content", () => {
        const cases: [OpenValue, ASN1Tag][] = [
            [{ type: "Boolean", value: true }, ASN1Tag.BOOLEAN],
            [{ type: "Integer", value: -1n }, ASN1Tag.INTEGER],
            [{ type: "Null", value: null }, ASN1Tag.NULL],
            [{ type: "OctetString", value: new Uint8Array([1, 2]) }, ASN1Tag.OCTET_STRING],
            [{ type: "BitString", value: new ASN1BitString(new Uint8Array([0x80]), 7) }, ASN1Tag.BIT_STRING],
            [{ type: "ObjectIdentifier", value: new ASN1ObjectIdentifier([2, 5, 4, 3]) }, ASN1Tag.OBJECT_IDENTIFIER],
            [{ type: "UTF8String", value: "text" }, ASN1Tag.UTF8_STRING],
            [{ type: "PrintableString", value: "Example" }, ASN1Tag.PRINTABLE_STRING],
            [{ type: "BMPString", value: "wide" }, ASN1Tag.BMP_STRING],
            [{ type: "UTCTime", value: new Date(0) }, ASN1Tag.UTC_TIME],
            [{ type: "GeneralizedTime", value: new GeneralizedTime(new Date(0), -300) }, ASN1Tag.GENERALIZED_TIME],
        ];
        for (const [value, tag] of cases) {
            expect(openTag(value)).toBe(tag);
            expect(resolveTag(ASN1Open, value)).toBe(tag);
        }
    });

    test("test_unknown_payload_keeps_its_tag", () => {
        const tag = ASN1Tag.privateUse(42n);
        const value: OpenValue = { type: "Unknown", tag, value: new Uint8Array([0xde, 0xad]) };
        expect(openTag(value)).toBe(tag);
        expect(resolveTag(Optional(ASN1Open), value)).toBe(tag);
        expect(resolveTag(Optional(ASN1Open), undefined)).toBe(ASN1Tag.EOC);
    });

    test("test_instance_of", () => {
        const typeId = new ASN1ObjectIdentifier([1, 2, 840, 113549, 1, 9, 14]);
        const instance = new InstanceOf<OpenValue>(typeId, { type: "Integer", value: 3n });
        expect(InstanceOf.TAG).toBe(ASN1Tag.EXTERNAL);
        expect(ASN1Tag.EXTERNAL.tagNumber).toBe(8n);
        expect(instance.typeId.toString()).toBe("1.2.840.113549.1.9.14");
        expect(openTag(instance.value)).toBe(ASN1Tag.INTEGER);
        expect(openTag({ type: "InstanceOf", value: instance })).toBe(ASN1Tag.EXTERNAL);
        expect(resolveTag(InstanceOf, instance)).toBe(ASN1Tag.EXTERNAL);
    });

    test("test_instance_of_with_typed_value", () => {
        const instance = new InstanceOf(new ASN1ObjectIdentifier([2, 5, 4, 3]), "example");
        expect(instance.value).toBe("example");
    });
});
