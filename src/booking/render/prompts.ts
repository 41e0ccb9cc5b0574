import { getAppointmentDetails } from "@/booking/store/appointments";
import { NotFoundError, parseInput } from "@/booking/store/errors";
import { getDailySchedule } from "@/booking";
import type { BookingContext } from "@/booking";
import { today } from "@/booking/store/time";
import { idSchema } from "@/booking/types/api";

export const PROMPT_NAMES = ["daily_briefing", "appointment_reminder"] as const;

/** Resolve a prompt by name. `arg` is the date or the appointment id. */
export function renderPrompt(ctx: BookingContext, name: string, arg?: string): string {
  switch (name) {
    case "daily_briefing":
      return dailyBriefingPrompt(ctx, arg);
    case "appointment_reminder":
      return appointmentReminderPrompt(ctx, parseInput(idSchema, arg));
    default:
      throw new NotFoundError("Prompt", name);
  }
}

/**
 * Instructions for writing the briefing of one day, with the day's
 * appointments (cancelled ones left out) inlined.
 */
export function dailyBriefingPrompt(ctx: BookingContext, date: string = today()): string {
  const schedule = getDailySchedule(ctx, date);

  const lines = [
    `Write a clear, well organised daily briefing for ${schedule.date}.`,
    "",
    "DATA:",
    `- Total appointments: ${schedule.total}`,
    `- Urgent appointments: ${schedule.stats.urgent}`,
    `- Confirmed appointments: ${schedule.stats.confirmed}`,
    "",
    "APPOINTMENTS:",
  ];
  if (schedule.appointments.length === 0) {
    lines.push("- None");
  }
  for (const a of schedule.appointments) {
    const urgent = a.urgent ? "URGENT - " : "";
    const type = a.typeName ? ` (${a.typeName})` : "";
    lines.push(`- ${a.startTime}-${a.endTime}: ${urgent}${a.client.firstName} ${a.client.lastName} - ${a.title}${type}`);
    if (a.description) lines.push(`  Details: ${a.description}`);
  }

  lines.push(
    "",
    "The briefing should include:",
    "1. A greeting and an overview of the day",
    "2. The appointments in order, each with time, client, appointment type and any notes or urgency",
    "3. Suggestions for organising the day",
    "4. Alerts for urgent or closely spaced appointments",
    "5. An encouraging close",
    "",
    "Keep the tone professional and clear.",
  );
  return lines.join("\n");
}

/** Instructions for writing a reminder message for one appointment. */
export function appointmentReminderPrompt(ctx: BookingContext, id: number): string {
  const a = getAppointmentDetails(ctx.db, id);

  const lines = [
    "Write a professional reminder message for this appointment:",
    "",
    `Client: ${a.client.firstName} ${a.client.lastName}`,
    `Date: ${a.date}`,
    `Time: ${a.startTime} - ${a.endTime}`,
    `Type: ${a.typeName ?? "Appointment"}`,
    `Location: ${a.location ?? "Not specified"}`,
  ];
  if (a.urgent) lines.push("URGENT APPOINTMENT");
  if (a.description) lines.push(`Description: ${a.description}`);

  lines.push(
    "",
    "The message should:",
    "1. Be polite and professional",
    "2. Give the exact date, time and location",
    `3. ${a.urgent ? "Stress that the appointment is urgent" : "Keep a standard tone"}`,
    "4. Explain how to confirm or reschedule",
    "5. Run to three or four sentences",
    "",
    "It should fit in an SMS or an email.",
  );
  return lines.join("\n");
}
