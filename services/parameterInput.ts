import { z } from 'zod';
import type { NumberFieldConfig, SweepParams } from '../types';
import { PARAMETER_CONFIGS } from '../constants';

export type ParameterInputs = Partial<Record<keyof SweepParams, string>>;

export type ParameterParseResult =
  | { ok: true; params: SweepParams }
  | { ok: false; errors: Partial<Record<keyof SweepParams, string>> };

export type NumberListParseResult = { ok: true; values: number[] } | { ok: false; error: string };

const numberField = (config: NumberFieldConfig) => {
  let num = z.number({ invalid_type_error: 'Not a valid number.' }).finite({ message: 'Not a valid number.' });
  if (config.min !== undefined) {
    num = config.exclusiveMin
      ? num.gt(config.min, { message: `Value must be greater than ${config.min}.` })
      : num.gte(config.min, { message: `Min value is ${config.min}.` });
  }
  if (config.max !== undefined) {
    num = num.lte(config.max, { message: `Max value is ${config.max}.` });
  }
  return z.string().trim().min(1, { message: 'Value cannot be empty.' }).transform(Number).pipe(num);
};

/** Validates raw CLI strings against PARAMETER_CONFIGS; missing entries take their defaults. */
export const parseParameterInputs = (raw: ParameterInputs): ParameterParseResult => {
  const params: SweepParams = { I: 0, a: 0, T: 0, dt: 0 };
  const errors: Partial<Record<keyof SweepParams, string>> = {};

  for (const config of PARAMETER_CONFIGS) {
    const valueStr = raw[config.id];
    if (valueStr === undefined) {
      params[config.id] = config.defaultValue;
      continue;
    }
    const result = numberField(config).safeParse(valueStr);
    if (result.success) {
      params[config.id] = result.data;
    } else {
      errors[config.id] = result.error.issues[0].message;
    }
  }

  return Object.keys(errors).length > 0 ? { ok: false, errors } : { ok: true, params };
};

/** Parses a comma-separated list such as "0,1,0.5", checking every entry against `config`. */
export const parseNumberList = (raw: string, config: NumberFieldConfig): NumberListParseResult => {
  const schema = numberField(config);
  const values: number[] = [];
  const entries = raw.split(',');
  for (let i = 0; i < entries.length; i++) {
    const result = schema.safeParse(entries[i]);
    if (!result.success) {
      return { ok: false, error: `${config.label} entry ${i + 1}: ${result.error.issues[0].message}` };
    }
    values.push(result.data);
  }
  return { ok: true, values };
};
