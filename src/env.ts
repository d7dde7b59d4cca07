import dotenv from "dotenv";

dotenv.config();

export const config = {
  NODE_ENV: process.env.NODE_ENV || "development",
  // Explicit config file path; overrides <root>/.policyscan.yml lookup
  POLICYSCAN_CONFIG: process.env.POLICYSCAN_CONFIG || undefined,
  POLICYSCAN_LOG_LEVEL: process.env.POLICYSCAN_LOG_LEVEL || "info",
};
