import {
  cancelAppointment,
  completeAppointment,
  createBookingContext,
  findAppointments,
  getClientDetails,
  getDailySchedule,
  markReminderSent,
  modifyAppointment,
  removeAppointment,
  scheduleAppointment,
  upcomingAppointments,
  type BookingContext,
} from "@/booking";
import { closeDatabase, type BookingDatabase } from "@/booking/store/db";
import { findAppointment, getAppointment, listAppointments } from "@/booking/store/appointments";
import { createClient } from "@/booking/store/clients";
import { listHistory } from "@/booking/store/history";
import {
  ConstraintViolationError,
  ReferenceViolationError,
  SlotConflictError,
  StatusTransitionError,
} from "@/booking/store/errors";
import type { AppointmentType, Client } from "@/booking/types";
import { addConsulenza, addMario, openTestDatabase, testContext } from "./helpers";

const DAY = "2099-01-10";

describe("booking operations", () => {
  let db: BookingDatabase;
  let ctx: BookingContext;
  let mario: Client;
  let consulenza: AppointmentType;

  beforeEach(() => {
    db = openTestDatabase();
    ctx = testContext(db);
    mario = addMario(db);
    consulenza = addConsulenza(db);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  function visit(startTime: string, extra: { title?: string; date?: string } = {}) {
    return scheduleAppointment(ctx, {
      clientId: mario.id,
      typeId: consulenza.id,
      date: extra.date ?? DAY,
      startTime,
      title: extra.title ?? "Prima visita",
    });
  }

  describe("scheduleAppointment", () => {
    it("takes the end time from the type's duration and records the creation", () => {
      const appointment = visit("09:00");

      expect(appointment).toMatchObject({
        startTime: "09:00",
        endTime: "10:00",
        status: "confermato",
        urgent: false,
        location: "Studio Principale",
        typeName: "Consulenza",
        client: { firstName: "Mario", lastName: "Rossi", phone: "333-1111", email: null },
      });

      const history = listHistory(db, appointment.id);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({ changeType: "creazione", description: "Appuntamento creato" });
    });

    it("prefers an explicit duration, then falls back to 30 minutes", () => {
      const explicit = scheduleAppointment(ctx, {
        clientId: mario.id,
        typeId: consulenza.id,
        date: DAY,
        startTime: "09:00",
        durationMinutes: 45,
        title: "Breve",
      });
      const untyped = scheduleAppointment(ctx, {
        clientId: mario.id,
        date: DAY,
        startTime: "11:00",
        title: "Senza tipo",
      });

      expect(explicit.endTime).toBe("09:45");
      expect(untyped.endTime).toBe("11:30");
      expect(untyped.typeName).toBeNull();
    });

    it("uses an explicit end time over any duration", () => {
      const appointment = scheduleAppointment(ctx, {
        clientId: mario.id,
        typeId: consulenza.id,
        date: DAY,
        startTime: "09:00",
        endTime: "11:15",
        title: "Lunga",
      });

      expect(appointment.endTime).toBe("11:15");
    });

    it("rejects an end time that is not after the start", () => {
      expect(() =>
        scheduleAppointment(ctx, {
          clientId: mario.id,
          date: DAY,
          startTime: "10:00",
          endTime: "09:00",
          title: "Al contrario",
        }),
      ).toThrow(new ConstraintViolationError("End time 09:00 must be after start time 10:00"));
    });

    it("rejects appointments running past midnight", () => {
      expect(() =>
        scheduleAppointment(ctx, { clientId: mario.id, date: DAY, startTime: "23:45", title: "Tardi" }),
      ).toThrow(
        new ConstraintViolationError("An appointment starting at 23:45 and lasting 30 minutes would end after midnight"),
      );
    });

    it("fails for a client or type that does not exist", () => {
      expect(() =>
        scheduleAppointment(ctx, { clientId: 7, date: DAY, startTime: "09:00", title: "Nessuno" }),
      ).toThrow(new ReferenceViolationError("Client 7 does not exist"));
      expect(() =>
        scheduleAppointment(ctx, { clientId: mario.id, typeId: 3, date: DAY, startTime: "09:00", title: "Nessuno" }),
      ).toThrow(new ReferenceViolationError("Appointment type 3 does not exist"));
      expect(listAppointments(db)).toEqual([]);
    });

    it("refuses an overlapping slot and writes nothing", () => {
      const first = visit("09:00");

      let caught: unknown;
      try {
        visit("09:30", { title: "Seconda visita" });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SlotConflictError);
      if (caught instanceof SlotConflictError) {
        expect(caught.code).toBe("SLOT_CONFLICT");
        expect(caught.message).toBe('Conflicts with existing appointment: "Prima visita" (09:00-10:00)');
        expect(caught.conflicts.map((a) => a.id)).toEqual([first.id]);
      }
      expect(listAppointments(db)).toHaveLength(1);
    });

    it("books back-to-back slots", () => {
      visit("09:00");

      expect(visit("10:00").startTime).toBe("10:00");
    });

    it("allows overlaps when conflict checks are off", () => {
      ctx = testContext(db, { checkConflicts: false });
      visit("09:00");
      visit("09:30");

      expect(listAppointments(db)).toHaveLength(2);
    });

    it("keeps an explicit location and leaves it empty without a default", () => {
      const explicit = scheduleAppointment(ctx, {
        clientId: mario.id,
        date: DAY,
        startTime: "09:00",
        title: "Domicilio",
        location: "Via Roma 1",
      });
      ctx = testContext(db, { defaultLocation: null });
      const none = visit("14:00");

      expect(explicit.location).toBe("Via Roma 1");
      expect(none.location).toBeNull();
    });
  });

  describe("modifyAppointment", () => {
    it("moves the start and keeps the duration", () => {
      const { id } = visit("09:00");

      const result = modifyAppointment(ctx, id, { startTime: "11:00" });

      expect(result.changes).toEqual(["Orario modificato: 11:00 - 12:00"]);
      expect(result.appointment).toMatchObject({ startTime: "11:00", endTime: "12:00" });
      expect(listHistory(db, id)[0]).toMatchObject({
        changeType: "modifica",
        description: "Orario modificato: 11:00 - 12:00",
      });
    });

    it("changes the duration from the current start", () => {
      const { id } = visit("09:00");

      expect(modifyAppointment(ctx, id, { durationMinutes: 15 }).appointment.endTime).toBe("09:15");
    });

    it("describes every change in one history entry", () => {
      const { id } = visit("09:00");

      const result = modifyAppointment(ctx, id, {
        date: "2099-01-11",
        title: "Controllo",
        urgent: true,
        status: "in_attesa",
      });

      const description = "Data modificata in 2099-01-11; Titolo modificato; Stato cambiato in in_attesa; Urgenza: SI";
      expect(result.changes.join("; ")).toBe(description);
      expect(result.appointment).toMatchObject({
        date: "2099-01-11",
        title: "Controllo",
        urgent: true,
        status: "in_attesa",
      });
      expect(listHistory(db, id).map((e) => e.description)).toEqual([description, "Appuntamento creato"]);
    });

    it("removes the type", () => {
      const { id } = visit("09:00");

      const result = modifyAppointment(ctx, id, { typeId: null });

      expect(result.changes).toEqual(["Tipo rimosso"]);
      expect(result.appointment.typeName).toBeNull();
    });

    it("requires at least one change", () => {
      const { id } = visit("09:00");

      expect(() => modifyAppointment(ctx, id, {})).toThrow(new ConstraintViolationError("No changes specified"));
    });

    it("refuses to move onto another appointment and leaves the row unchanged", () => {
      visit("09:00");
      const second = scheduleAppointment(ctx, {
        clientId: mario.id,
        date: DAY,
        startTime: "10:00",
        title: "Controllo",
      });

      expect(() => modifyAppointment(ctx, second.id, { startTime: "09:30" })).toThrow(SlotConflictError);
      expect(getAppointment(db, second.id).startTime).toBe("10:00");
      expect(listHistory(db, second.id)).toHaveLength(1);
    });

    it("does not conflict with its own slot", () => {
      const { id } = visit("09:00");

      expect(modifyAppointment(ctx, id, { startTime: "09:15" }).appointment.endTime).toBe("10:15");
    });

    it("checks the slot when a cancelled appointment is reinstated", () => {
      const first = visit("09:00");
      cancelAppointment(ctx, first.id);
      visit("09:00", { title: "Seconda visita" });

      expect(() => modifyAppointment(ctx, first.id, { status: "confermato" })).toThrow(SlotConflictError);
      expect(() => completeAppointment(ctx, first.id)).toThrow(SlotConflictError);
      expect(getAppointment(db, first.id).status).toBe("cancellato");
    });

    it("reinstates a no-show whose slot is still free", () => {
      const { id } = visit("09:00");
      modifyAppointment(ctx, id, { status: "non_presentato" });

      expect(modifyAppointment(ctx, id, { status: "confermato" }).appointment.status).toBe("confermato");
    });

    it("moves a cancelled appointment onto a taken slot", () => {
      const cancelled = visit("11:00");
      cancelAppointment(ctx, cancelled.id);
      visit("09:00", { title: "Seconda visita" });

      const result = modifyAppointment(ctx, cancelled.id, { startTime: "09:00" });

      expect(result.appointment).toMatchObject({ startTime: "09:00", endTime: "10:00", status: "cancellato" });
    });

    it("honours a transition guard", () => {
      ctx = testContext(db, { canTransition: (from) => from !== "completato" });
      const { id } = visit("09:00");
      completeAppointment(ctx, id);

      expect(() => modifyAppointment(ctx, id, { status: "confermato" })).toThrow(
        new StatusTransitionError("completato", "confermato"),
      );
      expect(() => cancelAppointment(ctx, id)).toThrow(StatusTransitionError);
      expect(listHistory(db, id).map((e) => e.changeType)).toEqual(["completamento", "creazione"]);
    });
  });

  describe("status operations", () => {
    it("completes an appointment with notes", () => {
      const { id } = visit("09:00");

      const appointment = completeAppointment(ctx, id, "Tutto ok");

      expect(appointment).toMatchObject({ status: "completato", notes: "Tutto ok" });
      expect(listHistory(db, id)[0]).toMatchObject({
        changeType: "completamento",
        description: "Appuntamento completato",
      });
    });

    it("cancels softly and records the reason", () => {
      const a = visit("09:00");
      const b = visit("11:00");

      expect(cancelAppointment(ctx, a.id, "Malattia").status).toBe("cancellato");
      cancelAppointment(ctx, b.id);

      expect(findAppointment(db, a.id)?.status).toBe("cancellato");
      expect(listHistory(db, a.id)[0].description).toBe("Appuntamento cancellato. Motivo: Malattia");
      expect(listHistory(db, b.id)[0].description).toBe("Appuntamento cancellato");
    });

    it("frees the slot of a cancelled appointment", () => {
      const { id } = visit("09:00");
      cancelAppointment(ctx, id);

      expect(visit("09:00").startTime).toBe("09:00");
    });

    it("marks the reminder as sent", () => {
      const { id } = visit("09:00");

      expect(markReminderSent(ctx, id).reminderSent).toBe(true);
    });
  });

  describe("removeAppointment", () => {
    it("deletes the history under cascade", () => {
      const { id } = visit("09:00");

      expect(removeAppointment(ctx, id).removedHistoryEntries).toBe(1);
      expect(findAppointment(db, id)).toBeUndefined();
    });

    it("keeps an appointment with history under restrict", () => {
      ctx = testContext(db, { historyOnDelete: "restrict" });
      const { id } = visit("09:00");

      expect(() => removeAppointment(ctx, id)).toThrow(ConstraintViolationError);
      expect(findAppointment(db, id)).toBeDefined();
    });
  });

  describe("queries", () => {
    it("returns an empty schedule for a day without appointments", () => {
      expect(getDailySchedule(ctx, DAY)).toEqual({
        date: DAY,
        total: 0,
        stats: { urgent: 0, confirmed: 0, completed: 0 },
        appointments: [],
      });
    });

    it("summarises a day without its cancelled appointments", () => {
      const done = visit("08:00");
      completeAppointment(ctx, done.id);
      scheduleAppointment(ctx, {
        clientId: mario.id,
        date: DAY,
        startTime: "10:00",
        title: "Urgente",
        urgent: true,
      });
      const cancelled = visit("12:00");
      cancelAppointment(ctx, cancelled.id);

      const schedule = getDailySchedule(ctx, DAY);

      expect(schedule.total).toBe(2);
      expect(schedule.stats).toEqual({ urgent: 1, confirmed: 1, completed: 1 });
      expect(schedule.appointments.map((a) => a.startTime)).toEqual(["08:00", "10:00"]);
    });

    it("lists appointments from today onwards by default", () => {
      visit("09:00", { date: "2020-01-01", title: "Passato" });
      visit("09:00", { date: "2099-01-01", title: "Futuro" });

      expect(findAppointments(ctx).map((a) => a.title)).toEqual(["Futuro"]);
      expect(findAppointments(ctx, { from: "2019-12-31" }).map((a) => a.title)).toEqual(["Passato", "Futuro"]);
    });

    it("lists upcoming open appointments", () => {
      visit("09:00", { date: "2099-01-01", title: "Primo" });
      const done = visit("09:00", { date: "2099-01-02", title: "Fatto" });
      completeAppointment(ctx, done.id);
      visit("09:00", { date: "2099-01-03", title: "Terzo" });

      expect(upcomingAppointments(ctx, { from: "2099-01-01" }).map((a) => a.title)).toEqual(["Primo", "Terzo"]);
      expect(upcomingAppointments(ctx, { from: "2099-01-01", limit: 1 }).map((a) => a.title)).toEqual(["Primo"]);
    });

    it("gathers a client's recent appointments and totals", () => {
      const giulia = createClient(db, { firstName: "Giulia", lastName: "Bianchi", phone: "333-2222" });
      visit("09:00", { date: "2099-01-01", title: "Uno" });
      const second = visit("09:00", { date: "2099-01-02", title: "Due" });
      cancelAppointment(ctx, second.id);
      scheduleAppointment(ctx, { clientId: giulia.id, date: "2099-01-03", startTime: "09:00", title: "Altro" });

      const details = getClientDetails(ctx, mario.id);

      expect(details.client.id).toBe(mario.id);
      expect(details.recentAppointments.map((a) => a.title)).toEqual(["Due", "Uno"]);
      expect(details.counts).toEqual({
        confermato: 1,
        completato: 0,
        cancellato: 1,
        in_attesa: 0,
        non_presentato: 0,
        total: 2,
      });
    });
  });

  describe("createBookingContext", () => {
    it("reads the policy from the environment defaults and applies overrides", () => {
      expect(createBookingContext(db, { checkConflicts: false }).policy).toEqual({
        historyOnDelete: "cascade",
        checkConflicts: false,
        defaultLocation: "Studio Principale",
      });
    });
  });
});
