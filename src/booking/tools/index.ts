import { z } from "zod";
import {
  cancelAppointment,
  completeAppointment,
  findAppointments,
  getClientDetails,
  getDailySchedule,
  modifyAppointment,
  modifyRequestSchema,
  removeAppointment,
  scheduleAppointment,
  scheduleRequestSchema,
} from "@/booking";
import type { BookingContext } from "@/booking";
import { createClient, listClients } from "@/booking/store/clients";
import { getAppointment, searchAppointments } from "@/booking/store/appointments";
import { listHistory } from "@/booking/store/history";
import { appointmentFilterSchema, idSchema, isoDateSchema, newClientSchema } from "@/booking/types/api";
import { defineTool, ToolRegistry, type ToolResult } from "./registry";

export { ToolRegistry, defineTool } from "./registry";
export type { BookingTool, ToolDefinition, ToolOutput, ToolResult } from "./registry";

// --- Clients ---

const createClientTool = defineTool({
  name: "create_client",
  description: "Register a new client. First name, last name and phone are required.",
  schema: newClientSchema,
  handler: (ctx, args) => {
    const client = createClient(ctx.db, args);
    return { message: `Client ${client.firstName} ${client.lastName} created`, data: { client } };
  },
});

const searchClientsTool = defineTool({
  name: "search_clients",
  description: "Search clients by name or email, optionally by city. Only active clients unless active is false.",
  schema: z.object({
    query: z.string().optional(),
    city: z.string().optional(),
    active: z.boolean().default(true),
  }),
  handler: (ctx, args) => {
    const clients = listClients(ctx.db, args);
    return { message: `${clients.length} client(s) found`, data: { count: clients.length, clients } };
  },
});

const getClientDetailsTool = defineTool({
  name: "get_client_details",
  description: "A client's record with their 20 most recent appointments and totals per status.",
  schema: z.object({ id: idSchema }),
  handler: (ctx, args) => {
    const details = getClientDetails(ctx, args.id);
    return { message: `Client ${details.client.firstName} ${details.client.lastName}`, data: details };
  },
});

// --- Appointments ---

const createAppointmentTool = defineTool({
  name: "create_appointment",
  description:
    "Book an appointment (date YYYY-MM-DD, start HH:MM). The end time follows from the duration or the appointment type.",
  schema: scheduleRequestSchema,
  handler: (ctx, args) => {
    const appointment = scheduleAppointment(ctx, args);
    return {
      message: `Appointment created for ${appointment.client.firstName} ${appointment.client.lastName}`,
      data: { appointment },
    };
  },
});

const listAppointmentsTool = defineTool({
  name: "list_appointments",
  description: "List appointments from a date (default today), filtered by end date, status, urgency or client.",
  schema: appointmentFilterSchema,
  handler: (ctx, args) => {
    const appointments = findAppointments(ctx, args);
    return {
      message: `${appointments.length} appointment(s) found`,
      data: { count: appointments.length, appointments },
    };
  },
});

const updateAppointmentTool = defineTool({
  name: "update_appointment",
  description: "Change an appointment's date, time, duration, title, description, status, urgency, notes, location or type.",
  schema: modifyRequestSchema.extend({ id: idSchema }),
  handler: (ctx, { id, ...changes }) => {
    const result = modifyAppointment(ctx, id, changes);
    return { message: "Appointment updated", data: result };
  },
});

const completeAppointmentTool = defineTool({
  name: "complete_appointment",
  description: "Mark an appointment as completed, optionally replacing its notes.",
  schema: z.object({ id: idSchema, notes: z.string().optional() }),
  handler: (ctx, args) => {
    const appointment = completeAppointment(ctx, args.id, args.notes);
    return { message: `Appointment ${appointment.id} completed`, data: { appointment } };
  },
});

const deleteAppointmentTool = defineTool({
  name: "delete_appointment",
  description:
    "Cancel an appointment, keeping it on record with status cancellato. With hard: true the row is deleted.",
  schema: z.object({
    id: idSchema,
    reason: z.string().optional(),
    hard: z.boolean().default(false),
  }),
  handler: (ctx, args) => {
    if (args.hard) {
      const result = removeAppointment(ctx, args.id);
      return { message: `Appointment ${args.id} deleted`, data: result };
    }
    const appointment = cancelAppointment(ctx, args.id, args.reason);
    return {
      message: `Appointment of ${appointment.client.firstName} ${appointment.client.lastName} on ${appointment.date} cancelled`,
      data: { appointment },
    };
  },
});

const searchAppointmentsTool = defineTool({
  name: "search_appointments",
  description: "Keyword search over appointment title, description, notes and client name.",
  schema: z.object({ query: z.string().trim().min(1, "Query is required") }),
  handler: (ctx, args) => {
    const results = searchAppointments(ctx.db, args.query);
    return {
      message: `${results.length} appointment(s) match "${args.query}"`,
      data: { query: args.query, count: results.length, results },
    };
  },
});

const getDailyScheduleTool = defineTool({
  name: "get_daily_schedule",
  description: "Every appointment of one day (default today) except cancelled ones, with daily counts.",
  schema: z.object({ date: isoDateSchema.optional() }),
  handler: (ctx, args) => {
    const schedule = getDailySchedule(ctx, args.date);
    return { message: `${schedule.total} appointment(s) on ${schedule.date}`, data: schedule };
  },
});

const getAppointmentHistoryTool = defineTool({
  name: "get_appointment_history",
  description: "The change history of an appointment, newest first.",
  schema: z.object({ id: idSchema }),
  handler: (ctx, args) => {
    const appointment = getAppointment(ctx.db, args.id);
    const entries = listHistory(ctx.db, appointment.id);
    return { message: `${entries.length} change(s) recorded`, data: { appointmentId: appointment.id, entries } };
  },
});

export const bookingTools = [
  createClientTool,
  searchClientsTool,
  getClientDetailsTool,
  createAppointmentTool,
  listAppointmentsTool,
  updateAppointmentTool,
  completeAppointmentTool,
  deleteAppointmentTool,
  searchAppointmentsTool,
  getDailyScheduleTool,
  getAppointmentHistoryTool,
];

export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry(bookingTools);
}

export function invokeTool(ctx: BookingContext, name: string, rawArgs: unknown): ToolResult {
  return createToolRegistry().invoke(ctx, name, rawArgs);
}
