export { NmapAdapter, NMAP_SCAN_TYPES, type NmapScanType, type NmapMetadata } from "./nmap.js";
export { MasscanAdapter, type MasscanMetadata, type MasscanPort } from "./masscan.js";
export { NiktoAdapter, classifyNiktoSeverity, type NiktoItem, type NiktoMetadata } from "./nikto.js";
export { DirsearchAdapter, type DirsearchMetadata, type FoundPath } from "./dirsearch.js";
export {
  TheHarvesterAdapter,
  HARVESTER_SOURCES,
  type TheHarvesterMetadata,
} from "./theharvester.js";
export { Enum4linuxAdapter, type Enum4linuxMetadata, type SmbShare } from "./enum4linux.js";
export { SqlmapAdapter, type SqlmapMetadata, type SqlInjection } from "./sqlmap.js";
export { ZapAdapter, type ZapAlert, type ZapMetadata } from "./zap.js";
export {
  NucleiAdapter,
  NUCLEI_SEVERITIES,
  type NucleiMatch,
  type NucleiMetadata,
} from "./nuclei.js";
export { MetasploitAdapter, type ExploitModule, type MetasploitMetadata } from "./metasploit.js";
export {
  HydraAdapter,
  HYDRA_SERVICES,
  type HydraCredential,
  type HydraMetadata,
  type HydraService,
} from "./hydra.js";
export { JohnAdapter, type CrackedPassword, type JohnMetadata } from "./john.js";
