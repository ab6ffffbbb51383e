import { parseVcf, extractVariants, zygosityOf } from "./variants";

const HEADER = [
    "##fileformat=VCFv4.2",
    "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\tFORMAT\tSAMPLE1",
].join("\n");

function vcf(...rows: string[][]): string {
    return [HEADER, ...rows.map((r) => r.join("\t"))].join("\n") + "\n";
}

test("parse curated marker rows into variants", () => {
    const out = extractVariants(vcf(
        ["22", "42126611", "rs3892097", "C", "T", "99", "PASS", "GENE=CYP2D6;STAR=*4;DP=40", "GT:DP", "1/1:55"],
        ["10", "94781859", "rs4244285", "G", "A", "45.5", "PASS", "DP=22", "GT", "0/1"],
    ));

    expect(out.length).toBe(2);
    expect(out[0]).toEqual({
        rsid: "rs3892097",
        gene: "CYP2D6",
        allele: "*4",
        functionClass: "Poor metabolizer",
        cpicLevel: "A",
        genotype: "1/1",
        zygosity: "hom-alt",
        qualityScore: 99,
        readDepth: 55,
        chromosome: "22",
        position: "42126611",
        ref: "C",
        alt: "T",
        filter: "PASS",
        annotations: { gene: true, star: true, rsid: true },
    });
    expect(out[1].gene).toBe("CYP2C19");
    expect(out[1].zygosity).toBe("het");
    expect(out[1].qualityScore).toBe(45.5);
    expect(out[1].readDepth).toBe(22);
    expect(out[1].annotations).toEqual({ gene: false, star: false, rsid: true });
});

test("unknown ids and short rows are skipped, order is preserved", () => {
    const res = parseVcf(vcf(
        ["1", "100", "rs0000001", "A", "G", "50", "PASS", "DP=30", "GT", "1/1"],
        ["16", "69745145", "rs1800462", "C", "G", "60", "PASS"],
        ["6", "18130918", "rs1142345", "T", "C", "70", "PASS", "STAR_ALLELE=*3C", "GT", "0|1"],
        ["1", "97450058", "rs3918290", "C", "T", "80", "PASS", "GENE=DPYD", "GT", "0/0"],
    ));

    expect(res.readable).toBe(true);
    expect(res.dataLines).toBe(4);
    expect(res.skippedLines).toBe(2);
    expect(res.variants.map((v) => v.rsid)).toEqual(["rs1142345", "rs3918290"]);
    expect(res.variants[0].annotations.star).toBe(true);
    expect(res.variants[1].zygosity).toBe("hom-ref");
});

test("missing sample column defaults to a missing call", () => {
    const [v] = extractVariants(vcf(
        ["12", "21178615", "rs4149056", "T", "C", ".", "PASS", "GENE=SLCO1B1"],
    ));
    expect(v.genotype).toBe("./.");
    expect(v.zygosity).toBe("missing");
    expect(v.qualityScore).toBeNull();
    expect(v.readDepth).toBeNull();
});

test("sample DP wins over INFO DP and unparsable depth becomes null", () => {
    const out = extractVariants(vcf(
        ["10", "96741053", "rs1799853", "C", "T", "30", "PASS", "DP=12", "GT:AD:DP", "0/1:5,7:18"],
        ["10", "96702047", "rs1057910", "A", "C", "abc", "PASS", "DP=1.5", "GT:DP", "0/1:x"],
    ));
    expect(out[0].readDepth).toBe(18);
    expect(out[1].readDepth).toBeNull();
    expect(out[1].qualityScore).toBeNull();
});

test("INFO GENE overrides the marker gene", () => {
    const [v] = extractVariants(vcf(
        ["10", "96702047", "rs1057910", "A", "C", "30", "PASS", "GENE=VKORC1", "GT", "0/1"],
    ));
    expect(v.gene).toBe("VKORC1");
    expect(v.annotations.gene).toBe(true);
});

test("CRLF input, blank lines and comment-only input", () => {
    const crlf = "#header\r\n\r\n7\t1\trs4986893\tG\tA\t40\tPASS\t.\tGT\t1|1\r\n";
    expect(extractVariants(Buffer.from(crlf, "utf8")).map((v) => v.zygosity)).toEqual(["hom-alt"]);
    expect(parseVcf("##only\n#CHROM\n")).toEqual({ variants: [], readable: true, dataLines: 0, skippedLines: 0 });
    expect(extractVariants("")).toEqual([]);
});

test("zygosity of genotype calls", () => {
    expect(zygosityOf("0|0")).toBe("hom-ref");
    expect(zygosityOf("1/0")).toBe("het");
    expect(zygosityOf("1|1")).toBe("hom-alt");
    expect(zygosityOf("./.")).toBe("missing");
    expect(zygosityOf("1/2")).toBe("missing");
});
