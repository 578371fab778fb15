import { Transform } from 'class-transformer';

/**
 * Query-string boolean: "true" and "1" are true, anything else false.
 * Reads the raw value, since implicit conversion would turn "false" into true.
 */
export function BooleanQuery(): PropertyDecorator {
  return Transform(({ obj, key }) => {
    const raw: unknown = obj[key];
    return raw === true || raw === 'true' || raw === '1';
  });
}
