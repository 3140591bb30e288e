// src/index.ts
import "dotenv/config";
import { startServer } from "./server.js";

startServer();
