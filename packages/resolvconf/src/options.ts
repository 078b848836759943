import { parseUint } from '@resolvconf/ip';
import {
  FlagOption,
  MAX_OPTION_VALUE,
  NegatedFlagOption,
  NumericOption,
} from './constants.js';
import { ParseError } from './errors.js';
import { err, ok, type Result } from './types.js';

export type FlagField =
  | (typeof FlagOption)[keyof typeof FlagOption]
  | (typeof NegatedFlagOption)[keyof typeof NegatedFlagOption];

export type NumericField = (typeof NumericOption)[keyof typeof NumericOption];

export type FlagSetting = {
  type: 'flag';
  field: FlagField;
  value: boolean;
};

export type NumericSetting = {
  type: 'numeric';
  field: NumericField;
  value: number;
};

export type OptionSetting = FlagSetting | NumericSetting;

export type OptionTarget = Record<FlagField, boolean> &
  Record<NumericField, number>;

/**
 * Parses a single `key[:value]` token from an `options` directive.
 *
 * @example
 * parseOption('ndots:2', 0);
 * // { ok: true, value: { type: 'numeric', field: 'ndots', value: 2 } }
 */
export function parseOption(
  token: string,
  line: number
): Result<OptionSetting, ParseError> {
  const [key = '', value, ...rest] = token.split(':');

  if (rest.length > 0) {
    return err(new ParseError('ExtraData', line));
  }

  if (isKeyOf(FlagOption, key)) {
    return ok({
      type: 'flag',
      field: FlagOption[key],
      value: true,
    });
  }

  if (isKeyOf(NegatedFlagOption, key)) {
    return ok({
      type: 'flag',
      field: NegatedFlagOption[key],
      value: false,
    });
  }

  if (isKeyOf(NumericOption, key)) {
    const parsed = parseOptionValue(value);

    if (parsed === undefined) {
      return err(new ParseError('InvalidOptionValue', line));
    }

    return ok({
      type: 'numeric',
      field: NumericOption[key],
      value: parsed,
    });
  }

  return err(new ParseError('InvalidOption', line));
}

function isKeyOf<T extends object>(
  table: T,
  key: PropertyKey
): key is keyof T {
  return Object.hasOwn(table, key);
}

function parseOptionValue(value: string | undefined) {
  if (value === undefined || !/^[0-9]+$/.test(value)) {
    return undefined;
  }

  const parsed = parseUint(value);
  return parsed > MAX_OPTION_VALUE ? undefined : parsed;
}

/**
 * Applies a parsed option to its target. Later settings overwrite
 * earlier ones.
 */
export function applyOption(target: OptionTarget, setting: OptionSetting) {
  switch (setting.type) {
    case 'flag':
      target[setting.field] = setting.value;
      break;
    case 'numeric':
      target[setting.field] = setting.value;
      break;
  }
}
