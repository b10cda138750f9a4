import { z } from 'zod';
import { DEFAULT_BEHAVIOR_KEY } from './types.js';

const unitInterval = z.number().finite().min(0).max(1);
const nonEmpty = z.string().trim().min(1);

const temperatureControlSchema = z
  .object({
    mode: z.enum(['fixed', 'adaptive']),
    range: z.tuple([unitInterval, unitInterval]),
    value: unitInterval.optional(),
  })
  .strict()
  .superRefine((control, ctx) => {
    const [min, max] = control.range;
    if (min >= max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['range'],
        message: `range min (${min}) must be less than max (${max})`,
      });
    }
    if (control.value !== undefined) {
      if (control.mode !== 'fixed') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['value'],
          message: 'value is only allowed in fixed mode',
        });
      } else if (control.value < min || control.value > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['value'],
          message: `value ${control.value} lies outside range [${min}, ${max}]`,
        });
      }
    }
  });

export const contractSpecificationSchema = z
  .object({
    version: nonEmpty,
    description: z.string().optional(),
    role: nonEmpty,
    policy: z
      .object({
        pii_allowed: z.boolean(),
        compliance_tags: z.array(nonEmpty),
        allowed_tools: z.array(nonEmpty),
      })
      .strict(),
    behavioral_flags: z
      .object({
        conservatism: nonEmpty,
        verbosity: nonEmpty,
        temperature_control: temperatureControlSchema,
      })
      .strict(),
    response_contract: z
      .object({
        required_fields: z.array(nonEmpty),
        max_response_time_ms: z.number().int().positive(),
        on_failure: z
          .object({
            max_retries: z.number().int().nonnegative(),
            fallback: z.record(z.string(), z.unknown()),
          })
          .strict(),
        behavior_signature: z.object({ key: nonEmpty }).strict().optional(),
        confidence_levels: z.array(nonEmpty).min(1).optional(),
        allowed_decisions: z.array(nonEmpty).optional(),
      })
      .strict(),
    health: z
      .object({
        max_strikes: z.number().int().positive(),
        strike_window_seconds: z.number().int().positive(),
      })
      .strict(),
    escalation: z
      .object({
        on_unexpected_output: nonEmpty.optional(),
        on_context_mismatch: nonEmpty.optional(),
        on_unhealthy: nonEmpty.optional(),
        fallback_role: nonEmpty.optional(),
      })
      .strict(),
    // Present on serialized specifications; always recomputed.
    contract_hash: z.string().optional(),
  })
  .strict()
  .superRefine((spec, ctx) => {
    // Every required field must survive the fallback path.
    const behaviorKey = spec.response_contract.behavior_signature?.key ?? DEFAULT_BEHAVIOR_KEY;
    const producible = new Set([
      behaviorKey,
      'confidence',
      'reasoning',
      ...Object.keys(spec.response_contract.on_failure.fallback),
    ]);

    spec.response_contract.required_fields.forEach((field, index) => {
      if (!producible.has(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['response_contract', 'required_fields', index],
          message: `required field "${field}" has no default in on_failure.fallback`,
        });
      }
    });
  });

export type ContractSpecificationInput = z.input<typeof contractSpecificationSchema>;
