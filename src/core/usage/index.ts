export { DiskUsageProbe, type ProbeRequest, type UsageReporter } from "./probe";
