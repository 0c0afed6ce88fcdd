import "./util/Env";
import { createAndStartServer } from "./AppFactory";

createAndStartServer();
