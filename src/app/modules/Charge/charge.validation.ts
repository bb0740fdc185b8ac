import { z } from 'zod';

// Every field passes through as text, nested form or JSON values included.
const formField = z
  .unknown()
  .optional()
  .transform((value) => (value === undefined ? '' : String(value)));

const createChargeSchema = z.object({
  body: z.object({
    amount: formField,
    token: formField,
    email: formField,
  }),
});

export const ChargeValidation = {
  createChargeSchema,
};
