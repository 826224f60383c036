export enum ErrorCode {
    InvalidASN1Object = "InvalidASN1Object",
    InvalidOid = "InvalidOid",
    InvalidTag = "InvalidTag",
    ValueOutOfRange = "ValueOutOfRange",
    DuplicateChoiceTag = "DuplicateChoiceTag",
    UnknownAlternative = "UnknownAlternative",
}

export class ASN1Error extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string
    ) {
        super(`[${code}] ${message}`);
        this.name = "ASN1Error";
    }

    static new(code: ErrorCode, message: string): ASN1Error {
        return new ASN1Error(code, message);
    }
}
