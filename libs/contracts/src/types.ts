/** pgx.analyze.request.v1 */
export interface AnalyzeRequestV1 {
    patientId?: string;
    drug?: string;
    drugs?: string[];
    vcf: { text: string } | { s3: { bucket: string; key: string } };
}
