#!/usr/bin/env node
import dotenv from "dotenv";
import { main } from "./program";

dotenv.config();

main(process.argv)
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
