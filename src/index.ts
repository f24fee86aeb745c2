import "dotenv/config";
import express from "express";
import cors from "cors";
import { createCompletionClient } from "./lib/llm-providers";
import { createRecipeGenerator } from "./lib/recipe-generator";
import { normalizeIngredientUnits } from "./lib/units";
import { getSpicesForUser, summarizeRatingsForPrompt } from "./lib/user-profile-store";
import { createRecipeRouter } from "./routes/recipe";
import { requireAuth } from "./middleware/auth";

const app = express();
const PORT = process.env.PORT || 3001;

const generate = createRecipeGenerator({
  client: createCompletionClient(),
  normalizeUnits: normalizeIngredientUnits,
  getSpicesForUser,
  summarizeRatingsForPrompt,
});

app.use(cors());
app.use(express.json());

// Protected routes
app.use("/api/recipe", requireAuth, createRecipeRouter(generate));

app.get("/health", (_req, res) => {
  res.json({ status: "ok" });
});

app.listen(PORT, () => {
  console.log(`Pantry chef server running on http://localhost:${PORT}`);
});
