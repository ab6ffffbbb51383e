export { parseVcf, extractVariants, zygosityOf, type VcfParseResult } from "./vcf/variants";
