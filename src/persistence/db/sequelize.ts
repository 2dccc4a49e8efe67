/**
 * Sequelize Database Connection
 *
 * MySQL database holding subscriptions, judicial cases, monitored
 * publications and monitor logs. The publication table carries a unique
 * index on identity_hash, which is what makes concurrent cycles safe.
 */
import { Sequelize } from "sequelize";
import config from "../../config";
import { logger } from "../../monitoring/logger";

const USER = encodeURIComponent(config.dbUser);
const PASSWORD = encodeURIComponent(config.dbPassword);
const URI = `mysql://${USER}:${PASSWORD}@${config.dbHost}:${config.dbPort}/${config.dbName}`;

const sequelize = new Sequelize(URI, {
  dialect: "mysql",
  // Only log queries in development; production uses structured Pino logs
  logging:
    config.env === "development"
      ? (sql) => logger.debug({ sql }, "SQL Query")
      : false,
  // Gazette dates are read as Sao Paulo civil dates
  timezone: "-03:00",
  pool: {
    max: 10,
    min: 2,
    acquire: 30000,
    idle: 10000,
  },
});

export default sequelize;
