export { cockpit } from "./cockpit.js";
export { logs } from "./logs.js";
export { runs } from "./runs.js";
export { services } from "./services.js";
export { ssh } from "./ssh.js";
export { status } from "./status.js";
export { terminate } from "./terminate.js";
