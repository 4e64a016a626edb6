import express from "express";
import cors from "cors";
import { createImporterRouter } from "./api/importer.js";
import { loadImporterConfig } from "./services/config.js";
import { buildPipelineDeps } from "./services/pipelineDeps.js";

const config = loadImporterConfig();
const deps = buildPipelineDeps(config);

const app = express();

app.use(process.env.CORS_ALLOW_ALL === "false" ? cors({ origin: false }) : cors());
app.use(express.json());

app.get("/health", (_req, res) => {
  res.json({
    ok: true,
    default_country: config.defaultCountry,
    default_currency: config.defaultCurrency,
    suppliers: config.enabledSuppliers
  });
});

app.use("/importer", createImporterRouter(deps));

const port = process.env.PORT || 3000;
app.listen(port, () => {
  console.log(`Importer running on port ${port}`);
});
