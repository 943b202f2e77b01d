export {
  isString,
  isStringOrNull,
  isNotBlank,
  isNonemptyString,
  isStringList,
  isInteger,
  isNumber,
  isBoolean,
  isList,
  isDate,
  isUuid,
  minLength,
  maxLength,
  oneOf,
} from './validate.js';
export {
  toString,
  toStringOrNull,
  toInteger,
  toIntegerOrNull,
  toNumber,
  toNumberOrNull,
  toBoolean,
  toBooleanOrNull,
  nullToList,
  toEnumString,
  toUuid,
} from './convert.js';
