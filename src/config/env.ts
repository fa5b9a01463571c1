import dotenv from "dotenv";

// Imported first by config and logger so .env values are in process.env before either reads it
dotenv.config();
