import { createAndStartServer } from "./AppFactory";

await createAndStartServer();
