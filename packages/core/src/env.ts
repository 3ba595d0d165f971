import dotenv from "dotenv";

let loaded = false;

/** Read `.env` once per process; variables already set in the environment win. */
export function loadDotenv(): void {
  if (loaded) return;
  loaded = true;
  dotenv.config();
}
