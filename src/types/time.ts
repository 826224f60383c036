import { ASN1Error, ErrorCode } from "../errors";

const MAX_OFFSET_MINUTES = 23 * 60 + 59;

/**
 * An instant paired with the fixed UTC offset it was written in, the value
 * of a GeneralizedTime. `offsetMinutes` is east of UTC.
 */
export class GeneralizedTime {
    constructor(public readonly instant: Date, public readonly offsetMinutes: number = 0) {
        if (Number.isNaN(instant.getTime())) {
            throw ASN1Error.new(ErrorCode.ValueOutOfRange, "Invalid date");
        }
        if (!Number.isInteger(offsetMinutes) || Math.abs(offsetMinutes) > MAX_OFFSET_MINUTES) {
            throw ASN1Error.new(ErrorCode.ValueOutOfRange, `UTC offset out of range: ${offsetMinutes} minutes`);
        }
    }

    /** Offset in `+HHMM` / `-HHMM` form. */
    offsetString(): string {
        const sign = this.offsetMinutes < 0 ? "-" : "+";
        const abs = Math.abs(this.offsetMinutes);
        const hours = String(Math.floor(abs / 60)).padStart(2, "0");
        const minutes = String(abs % 60).padStart(2, "0");
        return `${sign}${hours}${minutes}`;
    }

    equals(other: GeneralizedTime): boolean {
        return this.instant.getTime() === other.instant.getTime() && this.offsetMinutes === other.offsetMinutes;
    }
}
