import { Stack, StackProps, Duration, CfnOutput, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as path from "path";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as lambda from "aws-cdk-lib/aws-lambda";
import { NodejsFunction, type NodejsFunctionProps } from "aws-cdk-lib/aws-lambda-nodejs";

export interface AuditStackProps extends StackProps {
    auditBucket: s3.IBucket; // provided by StorageStack
}

/** Shared audit writer; API functions invoke it asynchronously. */
export class AuditStack extends Stack {
    public readonly auditFn: NodejsFunction;

    constructor(scope: Construct, id: string, props: AuditStackProps) {
        super(scope, id, props);

        Tags.of(this).add("project", "pgx-risk");
        Tags.of(this).add("stack", "audit");

        const fn = (name: string, service: string, extra: Partial<NodejsFunctionProps>) =>
            new NodejsFunction(this, name, {
                entry: path.join(process.cwd(), "services", service, "src", "handler.ts"),
                handler: "handler",
                runtime: lambda.Runtime.NODEJS_20_X,
                memorySize: 128,
                timeout: Duration.seconds(10),
                bundling: { target: "node20", sourceMap: true, keepNames: true },
                ...extra,
            });

        this.auditFn = fn("AuditFn", "audit", {
            // Async invokes only: retry twice, then drop
            retryAttempts: 2,
            environment: { AUDIT_BUCKET: props.auditBucket.bucketName },
        });

        props.auditBucket.grantPut(this.auditFn);

        new CfnOutput(this, "AuditFnArn", { value: this.auditFn.functionArn });
    }
}
