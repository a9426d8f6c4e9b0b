export { AdbDriver, parseDevicesOutput, type AdbDriverOptions } from "./adb.js";
