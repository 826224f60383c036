import { describe, expect, expectTypeOf, test } from "vitest";
import { ASN1ConstOid, ASN1Error, ASN1ObjectIdentifier, ErrorCode } from "../src/asn1";

function codeOf(fn: () => unknown): ErrorCode | undefined {
    try {
        fn();
    } catch (error) {
        if (error instanceof ASN1Error) return error.code;
        throw error;
    }
    return undefined;
}

describe("Object identifiers", () => {
    test("test_valid_oid", () => {
        const rsa = new ASN1ObjectIdentifier([1, 2, 840, 113549]);
        expect(rsa.arcs).toEqual([1n, 2n, 840n, 113549n]);
        expect(rsa.toString()).toBe("1.2.840.113549");
    });

    test("test_bigint_arcs", () => {
        const oid = new ASN1ObjectIdentifier([2n, 999n, 18446744073709551616n]);
        expect(oid.toString()).toBe("2.999.18446744073709551616");
    });

    test("test_first_arc_out_of_range", () => {
        expect(codeOf(() => new ASN1ObjectIdentifier([3, 1]))).toBe(ErrorCode.InvalidOid);
    });

    test("test_second_arc_out_of_range", () => {
        expect(codeOf(() => new ASN1ObjectIdentifier([0, 40]))).toBe(ErrorCode.InvalidOid);
        expect(codeOf(() => new ASN1ObjectIdentifier([1, 40, 1]))).toBe(ErrorCode.InvalidOid);
        expect(codeOf(() => new ASN1ObjectIdentifier([0, 39]))).toBeUndefined();
        expect(codeOf(() => new ASN1ObjectIdentifier([2, 40]))).toBeUndefined();
    });

    test("test_malformed_arcs", () => {
        expect(codeOf(() => new ASN1ObjectIdentifier([]))).toBe(ErrorCode.InvalidOid);
        expect(codeOf(() => new ASN1ObjectIdentifier([1]))).toBe(ErrorCode.InvalidOid);
        expect(codeOf(() => new ASN1ObjectIdentifier([1, -2]))).toBe(ErrorCode.InvalidOid);
        expect(codeOf(() => new ASN1ObjectIdentifier([1, 2, 3.5]))).toBe(ErrorCode.InvalidOid);
        expect(codeOf(() => new ASN1ObjectIdentifier([1, 2, -1n]))).toBe(ErrorCode.InvalidOid);
    });

    test("test_error_message", () => {
        expect(() => new ASN1ObjectIdentifier([3, 1])).toThrow("[InvalidOid] First arc must be 0, 1, or 2, got 3");
    });

    test("test_parse_dotted", () => {
        expect(ASN1ObjectIdentifier.parse("1.2.840").equals(new ASN1ObjectIdentifier([1, 2, 840]))).toBe(true);
        expect(codeOf(() => ASN1ObjectIdentifier.parse("1..2"))).toBe(ErrorCode.InvalidOid);
        expect(codeOf(() => ASN1ObjectIdentifier.parse("1.02"))).toBe(ErrorCode.InvalidOid);
        expect(codeOf(() => ASN1ObjectIdentifier.parse("1.2.x"))).toBe(ErrorCode.InvalidOid);
        expect(codeOf(() => ASN1ObjectIdentifier.parse("3.1"))).toBe(ErrorCode.InvalidOid);
    });

    test("test_equality", () => {
        const a = new ASN1ObjectIdentifier([1, 3, 6, 1]);
        const b = new ASN1ObjectIdentifier([1n, 3n, 6n, 1n]);
        expect(a.equals(b)).toBe(true);
        expect(a.compare(b)).toBe(0);
        expect(a.equals(new ASN1ObjectIdentifier([1, 3, 6]))).toBe(false);
    });

    test("test_lexicographic_order", () => {
        const oneTwo = new ASN1ObjectIdentifier([1, 2]);
        const oneThree = new ASN1ObjectIdentifier([1, 3]);
        const oneTwoOne = new ASN1ObjectIdentifier([1, 2, 1]);

        expect(oneTwo.compare(oneThree)).toBe(-1);
        expect(oneThree.compare(oneTwo)).toBe(1);
        expect(oneTwo.compare(oneTwoOne)).toBe(-1);
        expect(oneTwoOne.compare(oneTwo)).toBe(1);
        expect(oneTwoOne.compare(oneThree)).toBe(-1);

        const sorted = [oneThree, oneTwoOne, oneTwo].sort((x, y) => x.compare(y)).map(String);
        expect(sorted).toEqual(["1.2", "1.2.1", "1.3"]);
    });

    test("test_const_oid", () => {
        const sha256 = new ASN1ConstOid([2, 16, 840, 1, 101, 3, 4, 2, 1]);
        expect(sha256.toString()).toBe("2.16.840.1.101.3.4.2.1");
        expect(sha256.arcs).toEqual([2n, 16n, 840n, 1n, 101n, 3n, 4n, 2n, 1n]);
        expect(sha256.equals(ASN1ObjectIdentifier.parse("2.16.840.1.101.3.4.2.1"))).toBe(true);
        expect(sha256.toOwned().equals(sha256)).toBe(true);
        expect(Object.isFrozen(sha256)).toBe(true);
        expectTypeOf(sha256.components).toEqualTypeOf<readonly [2, 16, 840, 1, 101, 3, 4, 2, 1]>();
    });

    test("test_const_oid_skips_validation", () => {
        const unchecked = new ASN1ConstOid([7, 1]);
        expect(unchecked.toString()).toBe("7.1");
        expect(codeOf(() => unchecked.toOwned())).toBe(ErrorCode.InvalidOid);
    });

    test("test_const_oid_as_table_key", () => {
        const names = new Map([[new ASN1ConstOid([2, 5, 4, 3]).toString(), "commonName"]]);
        expect(names.get(ASN1ObjectIdentifier.parse("2.5.4.3").toString())).toBe("commonName");
    });
});
