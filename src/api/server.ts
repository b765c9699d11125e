import express from "express";
import routes from "./routes";

const app = express();
const PORT = process.env.PORT || 3000;

// Middleware
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// CORS headers for development
app.use((req, res, next) => {
  res.header("Access-Control-Allow-Origin", "*");
  res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
  if (req.method === "OPTIONS") {
    res.sendStatus(200);
  } else {
    next();
  }
});

// Routes
app.use("/api", routes);

// Root endpoint
app.get("/", (req, res) => {
  res.json({
    message: "Fixed-Income Simulator API",
    version: "1.0.0",
    endpoints: {
      simulate: "POST /api/simulate",
      products: "GET /api/products",
      taxBrackets: "GET /api/tax-brackets",
      health: "GET /api/health",
    },
  });
});

// Error handling middleware
app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
  // body-parser sets status 400 on malformed JSON
  const status = "status" in err && typeof err.status === "number" ? err.status : 500;
  if (status >= 500) {
    console.error("Unhandled error:", err);
  }
  res.status(status).json({
    error: status >= 500 ? "Internal server error" : "Bad request",
    message: err.message,
  });
});

// Start server
if (require.main === module) {
  app.listen(PORT, () => {
    console.log(`Server running on port ${PORT}`);
    console.log(`API available at http://localhost:${PORT}/api`);
  });
}

export default app;
