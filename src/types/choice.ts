import { ASN1Error, ErrorCode } from "../errors";
import { tagOfValue, type AsnType, type DynamicallyTagged, type ValueOf } from "./asn_type";
import { ASN1Tag } from "./tag";

export type Alternatives = Readonly<Record<string, AsnType>>;

export type ChoiceValue<A extends Alternatives> = {
    [K in keyof A & string]: { readonly type: K; readonly value: ValueOf<A[K]> };
}[keyof A & string];

/**
 * A CHOICE has no tag of its own: it declares `ASN1Tag.EOC` and its wire tag
 * is the tag of whichever alternative is present.
 */
export interface ChoiceType<A extends Alternatives>
    extends AsnType<ChoiceValue<A>, typeof ASN1Tag.EOC>, DynamicallyTagged<ChoiceValue<A>> {
    readonly alternatives: A;
}

export function isChoiceType(type: AsnType): type is ChoiceType<Alternatives> {
    return type.TAG.isEndOfContents() && "alternatives" in type;
}

/** Every tag that can identify a value of `type`. */
export function possibleTags(type: AsnType): ASN1Tag[] {
    if (isChoiceType(type)) {
        return Object.values(type.alternatives).flatMap(possibleTags);
    }
    return [type.TAG];
}

export function Choice<A extends Alternatives>(alternatives: A): ChoiceType<A> {
    const seen: { name: string; tag: ASN1Tag }[] = [];
    for (const [name, type] of Object.entries(alternatives)) {
        for (const tag of possibleTags(type)) {
            if (tag.isEndOfContents()) continue;
            const clash = seen.find((entry) => entry.tag.equals(tag));
            if (clash) {
                throw ASN1Error.new(
                    ErrorCode.DuplicateChoiceTag,
                    `Alternatives "${clash.name}" and "${name}" share tag ${tag}`
                );
            }
            seen.push({ name, tag });
        }
    }

    const table: Alternatives = alternatives;
    return Object.freeze({
        TAG: ASN1Tag.EOC,
        alternatives,
        tagOf(value: ChoiceValue<A>): ASN1Tag {
            const alternative = Object.hasOwn(table, value.type) ? table[value.type] : undefined;
            if (alternative === undefined) {
                throw ASN1Error.new(ErrorCode.UnknownAlternative, `No alternative named "${value.type}"`);
            }
            return tagOfValue(alternative, value.value);
        },
    });
}
