import { ASN1Error, ErrorCode } from "../errors";
import type { AsnType } from "./asn_type";
import { ASN1Tag } from "./tag";

/**
 * A BIT STRING, most significant bit first. `paddingBits` counts the unused
 * low-order bits of the last byte.
 */
export class ASN1BitString {
    static readonly TAG = ASN1Tag.BIT_STRING;

    constructor(public readonly bytes: Uint8Array, public readonly paddingBits: number = 0) {
        if (!Number.isInteger(paddingBits) || paddingBits < 0 || paddingBits > 7) {
            throw ASN1Error.new(ErrorCode.InvalidASN1Object, `Invalid padding bits: ${paddingBits}`);
        }
        if (bytes.length === 0 && paddingBits !== 0) {
            throw ASN1Error.new(ErrorCode.InvalidASN1Object, "Empty BitString must have 0 padding bits");
        }
    }

    static fromBits(bits: readonly boolean[]): ASN1BitString {
        const bytes = new Uint8Array(Math.ceil(bits.length / 8));
        bits.forEach((bit, i) => {
            if (bit) {
                bytes[i >> 3] = (bytes[i >> 3] ?? 0) | (0x80 >> (i & 7));
            }
        });
        return new ASN1BitString(bytes, (8 - (bits.length % 8)) % 8);
    }

    get length(): number {
        return this.bytes.length * 8 - this.paddingBits;
    }

    get(index: number): boolean {
        if (!Number.isInteger(index) || index < 0 || index >= this.length) {
            throw ASN1Error.new(ErrorCode.ValueOutOfRange, `Bit index ${index} out of range 0..${this.length}`);
        }
        const byte = this.bytes[index >> 3] ?? 0;
        return (byte & (0x80 >> (index & 7))) !== 0;
    }

    toBits(): boolean[] {
        return Array.from({ length: this.length }, (_, i) => this.get(i));
    }
}

ASN1BitString satisfies AsnType<ASN1BitString>;
