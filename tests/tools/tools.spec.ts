import { z } from "zod";
import type { BookingContext } from "@/booking";
import { closeDatabase, type BookingDatabase } from "@/booking/store/db";
import { deactivateClient } from "@/booking/store/clients";
import { bookingTools, createToolRegistry, defineTool, invokeTool, ToolRegistry } from "@/booking/tools";
import { addConsulenza, addMario, openTestDatabase, testContext } from "../helpers";

describe("booking tools", () => {
  let db: BookingDatabase;
  let ctx: BookingContext;

  beforeEach(() => {
    db = openTestDatabase();
    ctx = testContext(db);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  function bookFirstVisit() {
    addMario(db);
    addConsulenza(db);
    return invokeTool(ctx, "create_appointment", {
      clientId: 1,
      typeId: 1,
      date: "2025-12-01",
      startTime: "09:00",
      title: "Prima visita",
    });
  }

  it("lists every tool once", () => {
    expect(createToolRegistry().list().map((t) => t.name)).toEqual([
      "create_client",
      "search_clients",
      "get_client_details",
      "create_appointment",
      "list_appointments",
      "update_appointment",
      "complete_appointment",
      "delete_appointment",
      "search_appointments",
      "get_daily_schedule",
      "get_appointment_history",
    ]);
  });

  it("refuses to register a tool twice", () => {
    expect(() => new ToolRegistry([...bookingTools, bookingTools[0]])).toThrow(
      "Tool already registered: create_client",
    );
  });

  it("reports an unknown tool", () => {
    expect(invokeTool(ctx, "send_reminder", {})).toEqual({
      success: false,
      error: "Unknown tool: send_reminder",
      code: "NOT_FOUND",
    });
  });

  it("creates a client", () => {
    expect(invokeTool(ctx, "create_client", { firstName: "Mario", lastName: "Rossi", phone: "333-1111" })).toMatchObject({
      success: true,
      message: "Client Mario Rossi created",
      data: { client: { id: 1, firstName: "Mario", active: true } },
    });
  });

  it("returns validation failures instead of throwing", () => {
    expect(invokeTool(ctx, "create_client", { firstName: "Mario", lastName: "Rossi" })).toEqual({
      success: false,
      error: "phone: Phone is required",
      code: "CONSTRAINT_VIOLATION",
    });
  });

  it("searches active clients unless told otherwise", () => {
    addMario(db);
    const giulia = invokeTool(ctx, "create_client", { firstName: "Giulia", lastName: "Bianchi", phone: "333-2222" });
    expect(giulia.success).toBe(true);
    deactivateClient(db, 2);

    expect(invokeTool(ctx, "search_clients", {})).toMatchObject({ message: "1 client(s) found", data: { count: 1 } });
    expect(invokeTool(ctx, "search_clients", { active: false })).toMatchObject({
      message: "1 client(s) found",
      data: { clients: [{ firstName: "Giulia" }] },
    });
  });

  it("books the first visit with the type's duration", () => {
    expect(bookFirstVisit()).toMatchObject({
      success: true,
      message: "Appointment created for Mario Rossi",
      data: {
        appointment: {
          id: 1,
          date: "2025-12-01",
          startTime: "09:00",
          endTime: "10:00",
          status: "confermato",
          urgent: false,
          location: "Studio Principale",
        },
      },
    });
  });

  it("reports a missing client as a reference error", () => {
    expect(
      invokeTool(ctx, "create_appointment", { clientId: 42, date: "2025-12-01", startTime: "09:00", title: "Visita" }),
    ).toEqual({ success: false, error: "Client 42 does not exist", code: "REFERENCE_ERROR" });
  });

  it("reports a slot conflict", () => {
    bookFirstVisit();

    expect(
      invokeTool(ctx, "create_appointment", { clientId: 1, date: "2025-12-01", startTime: "09:30", title: "Altro" }),
    ).toEqual({
      success: false,
      error: 'Conflicts with existing appointment: "Prima visita" (09:00-10:00)',
      code: "SLOT_CONFLICT",
    });
  });

  it("accepts identifiers given as strings", () => {
    bookFirstVisit();

    expect(invokeTool(ctx, "get_client_details", { id: "1" })).toMatchObject({
      success: true,
      message: "Client Mario Rossi",
      data: { counts: { total: 1, confermato: 1 } },
    });
  });

  it("rejects identifiers that are not whole positive numbers", () => {
    addMario(db);

    expect(invokeTool(ctx, "get_client_details", { id: true })).toEqual({
      success: false,
      error: "id: Identifier must be a number",
      code: "CONSTRAINT_VIOLATION",
    });
    expect(invokeTool(ctx, "get_client_details", { id: "uno" })).toEqual({
      success: false,
      error: "id: Identifier must be a number",
      code: "CONSTRAINT_VIOLATION",
    });
    expect(invokeTool(ctx, "get_client_details", { id: "0" })).toEqual({
      success: false,
      error: "id: Identifier must be positive",
      code: "CONSTRAINT_VIOLATION",
    });
  });

  it("lists appointments and a day's schedule", () => {
    bookFirstVisit();

    expect(invokeTool(ctx, "list_appointments", { from: "2025-12-01" })).toMatchObject({
      message: "1 appointment(s) found",
      data: { count: 1 },
    });
    expect(invokeTool(ctx, "get_daily_schedule", { date: "2025-12-02" })).toEqual({
      success: true,
      message: "0 appointment(s) on 2025-12-02",
      data: {
        date: "2025-12-02",
        total: 0,
        stats: { urgent: 0, confirmed: 0, completed: 0 },
        appointments: [],
      },
    });
  });

  it("updates an appointment and reports the changes", () => {
    bookFirstVisit();

    expect(invokeTool(ctx, "update_appointment", { id: 1, startTime: "11:00", urgent: true })).toMatchObject({
      success: true,
      message: "Appointment updated",
      data: {
        appointment: { startTime: "11:00", endTime: "12:00", urgent: true },
        changes: ["Orario modificato: 11:00 - 12:00", "Urgenza: SI"],
      },
    });
  });

  it("completes an appointment and shows its history", () => {
    bookFirstVisit();

    expect(invokeTool(ctx, "complete_appointment", { id: 1 })).toMatchObject({
      success: true,
      message: "Appointment 1 completed",
    });
    expect(invokeTool(ctx, "get_appointment_history", { id: 1 })).toMatchObject({
      success: true,
      message: "2 change(s) recorded",
      data: {
        appointmentId: 1,
        entries: [{ changeType: "completamento" }, { changeType: "creazione" }],
      },
    });
  });

  it("cancels by default and deletes with hard", () => {
    bookFirstVisit();

    expect(invokeTool(ctx, "delete_appointment", { id: 1, reason: "Malattia" })).toMatchObject({
      success: true,
      message: "Appointment of Mario Rossi on 2025-12-01 cancelled",
      data: { appointment: { status: "cancellato" } },
    });
    expect(invokeTool(ctx, "delete_appointment", { id: 1, hard: true })).toMatchObject({
      success: true,
      message: "Appointment 1 deleted",
      data: { removedHistoryEntries: 2 },
    });
    expect(invokeTool(ctx, "get_appointment_history", { id: 1 })).toEqual({
      success: false,
      error: "Appointment 1 not found",
      code: "NOT_FOUND",
    });
  });

  it("requires a search query", () => {
    expect(invokeTool(ctx, "search_appointments", { query: "   " })).toEqual({
      success: false,
      error: "query: Query is required",
      code: "CONSTRAINT_VIOLATION",
    });
  });

  it("searches appointments by keyword", () => {
    bookFirstVisit();

    expect(invokeTool(ctx, "search_appointments", { query: "visita" })).toMatchObject({
      success: true,
      message: '1 appointment(s) match "visita"',
      data: { query: "visita", count: 1 },
    });
  });

  it("turns unexpected failures into internal errors", () => {
    const registry = new ToolRegistry([
      defineTool({
        name: "explode",
        description: "Always fails",
        schema: z.object({}),
        handler: () => {
          throw new Error("boom");
        },
      }),
    ]);

    expect(registry.invoke(ctx, "explode", undefined)).toEqual({ success: false, error: "boom", code: "INTERNAL" });
  });
});
