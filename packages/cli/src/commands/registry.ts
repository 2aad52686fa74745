import { bootstrap } from "./provision/bootstrap.js";
import { launch } from "./provision/launch.js";
import { cockpit, logs, runs, services, ssh, status, terminate } from "./manage/index.js";

export const baseCommands = {
  launch,
  bootstrap,
  status,
  ssh,
  logs,
  cockpit,
  services,
  terminate,
  runs,
};
