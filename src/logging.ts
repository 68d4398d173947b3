import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export type LoggerOptions = {
  /** Colourised output through pino-pretty. */
  pretty?: boolean;
  /** Explicit sink; wins over `pretty`. Defaults to stderr so stdout carries only the message. */
  destination?: pino.DestinationStream;
};

export const makeLogger = (
  level: LogLevel = "info",
  opts: LoggerOptions = {},
): Logger => {
  if (opts.destination) return pino({ level }, opts.destination);
  if (opts.pretty)
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss.l", destination: 2 },
      },
    });
  return pino({ level }, pino.destination(2));
};
