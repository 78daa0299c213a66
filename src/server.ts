// Load environment variables FIRST (before any other imports that might need them)
import "dotenv/config";

import express from "express";
import type { Application, Request, Response } from "express";
import cors from "cors";
import routes from "./routes/index.js";
import { API } from "./config/constants.js";

// Initialize Express app
const app: Application = express();
const PORT = process.env.PORT || 3000;

// Middleware
app.use(
  cors({
    origin: process.env.FRONTEND_URL || "http://localhost:5173",
  })
);
app.use(express.json({ limit: API.JSON_BODY_LIMIT }));

// API Routes
app.use(API.PREFIX, routes);

// Health check route
app.get("/health", (_req: Request, res: Response) => {
  res.json({
    status: "healthy",
    timestamp: new Date().toISOString(),
    environment: process.env.NODE_ENV,
  });
});

// Root route
app.get("/", (_req: Request, res: Response) => {
  res.json({
    message: "Highway Crash Atlas API",
    version: "1.0.0",
    endpoints: {
      health: "/health",
      matchCrashes: `${API.PREFIX}/crashes/match`,
      dedupLines: `${API.PREFIX}/lines/dedup`,
      categoryRates: `${API.PREFIX}/rates/categories`,
    },
  });
});

// 404 handler
app.use((req: Request, res: Response) => {
  res.status(404).json({
    error: "Route not found",
    path: req.path,
  });
});

// Start server
app.listen(PORT, () => {
  console.log("🚀 Server is running!");
  console.log(`📍 Port: ${PORT}`);
  console.log(`🌍 Environment: ${process.env.NODE_ENV}`);
  console.log(`🔗 URL: http://localhost:${PORT}`);
  console.log("✅ Press CTRL+C to stop\n");
});

export default app;
