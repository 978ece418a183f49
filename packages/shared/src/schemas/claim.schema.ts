import { z } from 'zod';
import { toCalendarDate } from '../utils/date.js';

// DECIMAL columns come back from mysql2 as strings.
const money = z.coerce.number().finite().nonnegative().default(0);

const recordId = z.coerce.number().int().positive();

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const calendarDate = z
  .union([z.date(), z.string()])
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined) return null;
    const date = toCalendarDate(value);
    if (date === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date' });
      return z.NEVER;
    }
    return date;
  });

export const ClaimRecordSchema = z.object({
  id: recordId,
  date: calendarDate,
  status: optionalText,
  totalCharge: money,
  insurancePaid: money,
  patientPaid: money,
});

export const ClaimLineItemSchema = z.object({
  cptCode: z.string().trim().min(1),
  description: optionalText,
  chargeAmount: money,
});

export const PatientRecordSchema = z.object({
  id: recordId,
  name: z.string().trim().min(1),
  dateOfBirth: calendarDate,
  insuranceProvider: optionalText,
  policyNumber: optionalText,
});

export const ProviderRecordSchema = z.object({
  id: recordId,
  name: z.string().trim().min(1),
  npi: optionalText,
  specialty: optionalText,
});

export const ClaimBundleSchema = z.object({
  claim: ClaimRecordSchema,
  items: z.array(ClaimLineItemSchema),
  patient: PatientRecordSchema,
  provider: ProviderRecordSchema,
});

export type ClaimBundleInput = z.input<typeof ClaimBundleSchema>;
