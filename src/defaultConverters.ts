import { defineConverter } from "./defineConverter";
import { Types } from "./defineType";
import type { Converter } from "./types";
import { v, valibot } from "./valibot";

// blank strings convert to "no value"
const blank = v.pipe(
  v.string(),
  v.trim(),
  v.empty(),
  v.transform(() => null),
);

const TRUE_VALUES = ["true", "on", "yes", "1"];
const FALSE_VALUES = ["false", "off", "no", "0"];

/**
 * Rules installed by `createConversionService()` unless `defaults: false`.
 *
 * @internal
 */
export function createDefaultConverters(): Converter[] {
  return [
    valibot(
      Types.string,
      Types.number,
      v.union([
        blank,
        v.pipe(
          v.string(),
          v.trim(),
          v.decimal(),
          v.transform(Number),
          // larger integers would silently round to a neighbouring value
          v.check(
            (value) => !Number.isInteger(value) || Number.isSafeInteger(value),
            "Integer is outside the safe integer range, convert to bigint",
          ),
        ),
      ]),
    ),
    valibot(
      Types.string,
      Types.bigint,
      v.union([
        blank,
        v.pipe(v.string(), v.trim(), v.regex(/^-?\d+$/u), v.transform<string, bigint>(BigInt)),
      ]),
    ),
    valibot(
      Types.string,
      Types.boolean,
      v.union([
        blank,
        v.pipe(
          v.string(),
          v.trim(),
          v.toLowerCase(),
          v.picklist([...TRUE_VALUES, ...FALSE_VALUES]),
          v.transform((value) => TRUE_VALUES.includes(value)),
        ),
      ]),
    ),
    valibot(
      Types.string,
      Types.date,
      v.union([
        blank,
        v.pipe(
          v.string(),
          v.trim(),
          v.transform((value) => new Date(value)),
          v.date(),
        ),
      ]),
    ),
    valibot(
      Types.number,
      Types.bigint,
      v.pipe(v.number(), v.integer(), v.transform<number, bigint>(BigInt)),
    ),
    defineConverter(Types.number, Types.string, (value) => String(value)),
    defineConverter(Types.bigint, Types.string, (value) => value.toString()),
    defineConverter(Types.boolean, Types.string, (value) => String(value)),
    defineConverter(Types.date, Types.string, (value) => value.toISOString()),
  ];
}
