//apps/demo-service/src/index.ts
import { createDemoService } from "./app";

const port = process.env.PORT ? Number(process.env.PORT) : 8787;
const apiKey = process.env.DEMO_API_KEY ?? "test-key";
const readyAfterPolls = process.env.DEMO_READY_AFTER_POLLS ? Number(process.env.DEMO_READY_AFTER_POLLS) : 2;

createDemoService({ apiKey, readyAfterPolls }).listen(port, () => {
  console.log(`demo-service listening on http://localhost:${port}`);
});
