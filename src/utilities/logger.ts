import * as TE from "fp-ts/TaskEither";
import winston from "winston";

// CLI output owns stdout, so every level goes to stderr
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(
      ({ timestamp, level, message }) => `${timestamp} ${level}: ${message}`
    )
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug"],
    }),
  ],
});

export const log = {
  taskEither: {
    debug:
      (message: string) =>
      <E, A>(ma: TE.TaskEither<E, A>): TE.TaskEither<E, A> =>
        TE.chainFirstIOK<A, void>(() => () => void logger.debug(message))(ma),
    debugLeft:
      <E>(message: (error: E) => string) =>
      <A>(ma: TE.TaskEither<E, A>): TE.TaskEither<E, A> =>
        TE.mapLeft((error: E) => {
          logger.debug(message(error));
          return error;
        })(ma),
  },
};
