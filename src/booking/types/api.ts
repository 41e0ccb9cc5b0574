import { z } from "zod";
import { APPOINTMENT_STATUSES } from "./index";

const requiredText = (label: string) =>
  z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`);

// Blank strings are stored as NULL
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const clearableText = z
  .string()
  .trim()
  .nullable()
  .optional()
  .transform((v) => (v === "" ? null : v));

const optionalEmail = optionalText.pipe(z.string().email("Must be a valid email").optional());

const clearableEmail = clearableText.pipe(z.string().email("Must be a valid email").nullable().optional());

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const isoDateSchema = z.string().superRefine((value, ctx) => {
  if (!ISO_DATE.test(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Date must be in YYYY-MM-DD format" });
  } else if (!isCalendarDate(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Date does not exist in the calendar" });
  }
});

export const timeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Time must be in 24-hour HH:MM format");

export const statusSchema = z.enum(APPOINTMENT_STATUSES);

// Numbers, or digit strings as they arrive from the command line
export const idSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, "Identifier must be a number")], {
    errorMap: () => ({ message: "Identifier must be a number" }),
  })
  .pipe(z.coerce.number().int("Identifier must be an integer").positive("Identifier must be positive"));

// --- Clients ---

export const newClientSchema = z.object({
  firstName: requiredText("First name"),
  lastName: requiredText("Last name"),
  phone: requiredText("Phone"),
  email: optionalEmail,
  secondaryPhone: optionalText,
  street: optionalText,
  streetNumber: optionalText,
  city: optionalText,
  postalCode: optionalText,
  province: optionalText,
  notes: optionalText,
});

export const clientChangesSchema = z.object({
  firstName: requiredText("First name").optional(),
  lastName: requiredText("Last name").optional(),
  phone: requiredText("Phone").optional(),
  email: clearableEmail,
  secondaryPhone: clearableText,
  street: clearableText,
  streetNumber: clearableText,
  city: clearableText,
  postalCode: clearableText,
  province: clearableText,
  notes: clearableText,
  active: z.boolean().optional(),
});

export type NewClient = z.input<typeof newClientSchema>;
export type ClientChanges = z.input<typeof clientChangesSchema>;

// --- Appointment types ---

const durationSchema = z
  .number()
  .int("Duration must be a whole number of minutes")
  .positive("Duration must be positive");

export const newAppointmentTypeSchema = z.object({
  name: requiredText("Type name"),
  description: optionalText,
  durationMinutes: durationSchema.default(30),
  color: optionalText,
});

export const appointmentTypeChangesSchema = z.object({
  name: requiredText("Type name").optional(),
  description: clearableText,
  durationMinutes: durationSchema.optional(),
  color: clearableText,
});

export type NewAppointmentType = z.input<typeof newAppointmentTypeSchema>;
export type AppointmentTypeChanges = z.input<typeof appointmentTypeChangesSchema>;

// --- Appointments ---

export const newAppointmentSchema = z.object({
  clientId: idSchema,
  typeId: idSchema.optional(),
  date: isoDateSchema,
  startTime: timeSchema,
  endTime: timeSchema,
  title: requiredText("Title"),
  description: optionalText,
  location: optionalText,
  notes: optionalText,
  urgent: z.boolean().default(false),
  status: statusSchema.default("confermato"),
  reminderSent: z.boolean().default(false),
});

export const appointmentChangesSchema = z.object({
  typeId: idSchema.nullable().optional(),
  date: isoDateSchema.optional(),
  startTime: timeSchema.optional(),
  endTime: timeSchema.optional(),
  title: requiredText("Title").optional(),
  description: clearableText,
  location: clearableText,
  notes: clearableText,
  urgent: z.boolean().optional(),
  status: statusSchema.optional(),
  reminderSent: z.boolean().optional(),
});

export type NewAppointment = z.input<typeof newAppointmentSchema>;
export type AppointmentChanges = z.input<typeof appointmentChangesSchema>;

export const appointmentFilterSchema = z.object({
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
  status: statusSchema.optional(),
  urgent: z.boolean().optional(),
  clientId: idSchema.optional(),
  limit: z.number().int().positive().optional(),
});

export type AppointmentFilter = z.input<typeof appointmentFilterSchema>;

function isCalendarDate(value: string): boolean {
  const [year, month, day] = value.split("-").map(Number);
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}
