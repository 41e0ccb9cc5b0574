import { getAppointmentDetails } from "@/booking/store/appointments";
import { NotFoundError } from "@/booking/store/errors";
import { getClientDetails, getDailySchedule, upcomingAppointments } from "@/booking";
import type { BookingContext, ClientDetails } from "@/booking";
import type { AppointmentDetails } from "@/booking/types";

export type ResourceKind = "appointment" | "schedule" | "client";

const RESOURCE_URI = /^(appointment|schedule|client):\/\/(.+)$/;

/**
 * Resolve `appointment://{id}`, `schedule://{date}` or `client://{id}`
 * to a plain-text view.
 */
export function readResource(ctx: BookingContext, uri: string): string {
  const match = RESOURCE_URI.exec(uri.trim());
  if (!match) throw new NotFoundError("Resource", uri);
  const [, kind, key] = match;

  switch (kind) {
    case "appointment":
      return renderAppointment(getAppointmentDetails(ctx.db, Number(key)));
    case "schedule":
      return renderSchedule(key, getDailySchedule(ctx, key).appointments);
    case "client": {
      const details = getClientDetails(ctx, Number(key));
      return renderClient(details, upcomingAppointments(ctx, { clientId: details.client.id }));
    }
    default:
      throw new NotFoundError("Resource", uri);
  }
}

export function renderAppointment(a: AppointmentDetails): string {
  const lines = [
    `APPOINTMENT #${a.id}${a.urgent ? " [URGENT]" : ""}`,
    `Title: ${a.title}`,
    `Type: ${a.typeName ?? "Not specified"}`,
    `Status: ${a.status.toUpperCase()}`,
    `Date: ${a.date}`,
    `Time: ${a.startTime} - ${a.endTime}`,
    `Location: ${a.location ?? "Not specified"}`,
    `Client: ${a.client.firstName} ${a.client.lastName}`,
    `Phone: ${a.client.phone}`,
    `Email: ${a.client.email ?? "Not available"}`,
  ];
  if (a.description) lines.push(`Description: ${a.description}`);
  if (a.notes) lines.push(`Notes: ${a.notes}`);
  lines.push(`Created: ${a.createdAt}`, `Modified: ${a.updatedAt}`);
  return lines.join("\n");
}

export function renderSchedule(date: string, appointments: AppointmentDetails[]): string {
  if (appointments.length === 0) return `No appointments on ${date}`;

  const blocks = appointments.map((a) =>
    [
      `${a.startTime} - ${a.endTime}${a.urgent ? " [URGENT]" : ""}`,
      `  ${a.client.firstName} ${a.client.lastName} (${a.client.phone})`,
      `  ${a.title}`,
      `  Status: ${a.status.toUpperCase()}`,
    ].join("\n"),
  );
  return [`SCHEDULE FOR ${date}`, `Total appointments: ${appointments.length}`, ...blocks].join("\n\n");
}

export function renderClient(details: ClientDetails, upcoming: AppointmentDetails[]): string {
  const { client, counts } = details;
  const lines = [
    `CLIENT #${client.id} - ${client.firstName} ${client.lastName}${client.active ? "" : " (inactive)"}`,
    `Phone: ${client.phone}`,
  ];
  if (client.secondaryPhone) lines.push(`Secondary phone: ${client.secondaryPhone}`);
  lines.push(`Email: ${client.email ?? "Not available"}`);

  if (client.street) {
    let address = [client.street, client.streetNumber].filter(Boolean).join(" ");
    if (client.city) {
      const town = [client.postalCode, client.city].filter(Boolean).join(" ");
      address += `, ${town}${client.province ? ` (${client.province})` : ""}`;
    }
    lines.push(`Address: ${address}`);
  }

  lines.push(
    `Appointments: ${counts.total} total, ${counts.completato} completed, ` +
      `${counts.confermato} confirmed, ${counts.cancellato} cancelled`,
  );

  if (upcoming.length > 0) {
    lines.push("Upcoming:");
    for (const a of upcoming) {
      lines.push(`  - ${a.date} ${a.startTime} ${a.title} (${a.status})`);
    }
  }
  if (client.notes) lines.push(`Notes: ${client.notes}`);
  lines.push(`Registered: ${client.registeredAt}`);
  return lines.join("\n");
}
