import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Logger, LogLevel, LogCategory } from "../../src/infrastructure/utils/logger";

describe("Logger", () => {
  let log: Logger;

  beforeEach(() => {
    log = new Logger({
      minLevel: LogLevel.WARN,
      logDir: "",
      maxMemoryLogs: 3,
      throttleWindowMs: 1000,
      maxThrottleCount: 2,
    });
  });

  afterEach(() => {
    log.destroy();
    vi.restoreAllMocks();
  });

  it("debe guardar solo en memoria las entradas bajo el nivel de consola", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    log.info("quiet", LogCategory.WORLD);
    log.warn("loud", LogCategory.WORLD);

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(log.queryLogs().map((e) => e.message)).toEqual(["quiet", "loud"]);
  });

  it("debe aceptar datos sin categoría", () => {
    log.debug("sin categoría", { value: 1 });
    log.debug("con categoría", LogCategory.PATHFINDING, { value: 2 });

    const [first, second] = log.queryLogs();
    expect(first?.category).toBe(LogCategory.GENERAL);
    expect(first?.data).toEqual({ value: 1 });
    expect(second?.category).toBe(LogCategory.PATHFINDING);
    expect(second?.data).toEqual({ value: 2 });
  });

  it("debe limitar los mensajes repetidos dentro de la ventana", () => {
    for (let i = 0; i < 4; i++) log.debug("same message");

    expect(log.queryLogs()).toHaveLength(2);
    expect(log.getMetrics().throttledCount).toBe(2);
  });

  it("debe acotar el buffer de memoria", () => {
    for (let i = 0; i < 5; i++) log.debug(`message ${i}`);

    expect(log.queryLogs().map((e) => e.message)).toEqual([
      "message 2",
      "message 3",
      "message 4",
    ]);
    expect(log.getMetrics().totalCount).toBe(5);
  });

  it("debe etiquetar los logs de robots con el id y el tick", () => {
    log.setTick(7);
    log.agentLog(LogLevel.DEBUG, LogCategory.ROBOTS, "r1", "stuck");
    log.debug("unrelated", LogCategory.ROBOTS);

    const entries = log.queryLogs({ agentId: "r1" });
    expect(entries).toHaveLength(1);
    expect(entries[0]?.message).toBe("[Agent:r1] stuck");
    expect(entries[0]?.tick).toBe(7);
  });

  it("debe filtrar por nivel, categoría, texto y límite", () => {
    log.debug("path planned", LogCategory.PATHFINDING);
    log.debug("robot moved", LogCategory.MOVEMENT);
    log.setMinLevel(LogLevel.ERROR);
    log.warn("path blocked", LogCategory.PATHFINDING);

    expect(log.queryLogs({ levels: [LogLevel.WARN] }).map((e) => e.message)).toEqual([
      "path blocked",
    ]);
    expect(
      log.queryLogs({ categories: [LogCategory.PATHFINDING] }).map((e) => e.message),
    ).toEqual(["path planned", "path blocked"]);
    expect(log.queryLogs({ messageContains: "PATH", limit: 1 }).map((e) => e.message)).toEqual([
      "path blocked",
    ]);
  });

  it("debe contar entradas por nivel y categoría", () => {
    log.debug("a", LogCategory.WORLD);
    log.debug("b", LogCategory.WORLD);
    log.setMinLevel(LogLevel.ERROR);
    log.warn("c", LogCategory.ROBOTS);

    const metrics = log.getMetrics();
    expect(metrics.byLevel[LogLevel.DEBUG]).toBe(2);
    expect(metrics.byLevel[LogLevel.WARN]).toBe(1);
    expect(metrics.byCategory[LogCategory.WORLD]).toBe(2);
    expect(metrics.byCategory[LogCategory.ROBOTS]).toBe(1);
    expect(metrics.totalCount).toBe(3);
  });

  it("debe reiniciar buffer, throttling y contadores con clear", () => {
    for (let i = 0; i < 3; i++) log.debug("repeat");
    log.clear();
    log.debug("repeat");

    expect(log.queryLogs()).toHaveLength(1);
    expect(log.getMetrics().throttledCount).toBe(0);
  });

  it("no debe hacer nada en flush sin directorio de logs", async () => {
    log.debug("pending");
    await expect(log.flush()).resolves.toBeUndefined();
  });
});
