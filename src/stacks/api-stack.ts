import { Stack, StackProps, Duration, CfnOutput, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as path from "path";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as dynamodb from "aws-cdk-lib/aws-dynamodb";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as apigw from "aws-cdk-lib/aws-apigateway";
import * as iam from "aws-cdk-lib/aws-iam";
import * as secretsmanager from "aws-cdk-lib/aws-secretsmanager";
import { NodejsFunction, type NodejsFunctionProps } from "aws-cdk-lib/aws-lambda-nodejs";

export interface ApiStackProps extends StackProps {
    uploadBucket: s3.IBucket;
    guidelinesTable: dynamodb.ITable;
    auditFn: lambda.IFunction;
    metricsNamespace?: string; // default "pgx.risk"
}

export class ApiStack extends Stack {
    public readonly url: string;
    public readonly analyzeFn: NodejsFunction;
    public readonly uploadUrlFn: NodejsFunction;
    public readonly healthFn: NodejsFunction;

    constructor(scope: Construct, id: string, props: ApiStackProps) {
        super(scope, id, props);

        Tags.of(this).add("project", "pgx-risk");
        Tags.of(this).add("stack", "api");

        const NS = props.metricsNamespace ?? "pgx.risk";
        const ctx = (key: string): string | undefined => {
            const value: unknown = this.node.tryGetContext(key);
            return typeof value === "string" && value ? value : undefined;
        };
        const baseUrl = ctx("openaiBaseUrl");
        const model = ctx("openaiModel");
        const keySecretName = ctx("openaiApiKeySecret");

        const fn = (name: string, service: string, extra: Partial<NodejsFunctionProps>) =>
            new NodejsFunction(this, name, {
                entry: path.join(process.cwd(), "services", service, "src", "handler.ts"),
                handler: "handler",
                runtime: lambda.Runtime.NODEJS_20_X,
                memorySize: 256,
                timeout: Duration.seconds(10),
                bundling: { target: "node20", sourceMap: true, keepNames: true },
                ...extra,
            });

        // Only the secret's name reaches the template; AnalyzeFn reads the value at cold start.
        const keySecret = keySecretName
            ? secretsmanager.Secret.fromSecretNameV2(this, "OpenAiApiKeySecret", keySecretName)
            : undefined;
        const keyEnv: Record<string, string> = keySecretName ? { OPENAI_API_KEY_SECRET: keySecretName } : {};

        // Advisory calls must finish inside the 29s API Gateway integration limit.
        const advisoryEnv: Record<string, string> = {
            ADVISORY_TIMEOUT_MS: ctx("advisoryTimeoutMs") ?? "12000",
            ...(baseUrl ? { OPENAI_BASE_URL: baseUrl } : {}),
            ...(model ? { OPENAI_MODEL: model } : {}),
            ...keyEnv,
        };

        this.analyzeFn = fn("AnalyzeFn", "analyze", {
            memorySize: 512,
            timeout: Duration.seconds(29),
            environment: {
                UPLOAD_BUCKET: props.uploadBucket.bucketName,
                GUIDELINES_TABLE: props.guidelinesTable.tableName,
                AUDIT_FN_ARN: props.auditFn.functionArn,
                METRICS_NS: NS,
                ...advisoryEnv,
            },
        });

        this.uploadUrlFn = fn("UploadUrlFn", "upload-url-api", {
            environment: {
                UPLOAD_BUCKET: props.uploadBucket.bucketName,
                EXPIRES_SECONDS: "900",
                AUDIT_FN_ARN: props.auditFn.functionArn,
                METRICS_NS: NS,
            },
        });

        this.healthFn = fn("HealthFn", "health-api", {
            environment: {
                GUIDELINES_TABLE: props.guidelinesTable.tableName,
                ...keyEnv,
            },
        });

        // Least-privilege
        props.uploadBucket.grantRead(this.analyzeFn);
        props.uploadBucket.grantPut(this.uploadUrlFn);
        props.guidelinesTable.grantReadData(this.analyzeFn);
        keySecret?.grantRead(this.analyzeFn);
        props.auditFn.grantInvoke(this.analyzeFn);
        props.auditFn.grantInvoke(this.uploadUrlFn);

        for (const f of [this.analyzeFn, this.uploadUrlFn]) {
            f.addToRolePolicy(new iam.PolicyStatement({
                actions: ["cloudwatch:PutMetricData"],
                resources: ["*"],
                conditions: { "StringEquals": { "cloudwatch:namespace": NS } },
            }));
        }

        const api = new apigw.RestApi(this, "PgxApi", {
            restApiName: "pgx-risk",
            deployOptions: { stageName: "prod", throttlingBurstLimit: 20, throttlingRateLimit: 10 },
            defaultCorsPreflightOptions: {
                allowOrigins: apigw.Cors.ALL_ORIGINS,
                allowMethods: ["GET", "POST", "OPTIONS"],
            },
        });

        // Routes: POST /analyze, POST /uploads/url, GET /health
        api.root.addResource("analyze").addMethod("POST", new apigw.LambdaIntegration(this.analyzeFn));
        api.root.addResource("uploads").addResource("url").addMethod("POST", new apigw.LambdaIntegration(this.uploadUrlFn));
        api.root.addResource("health").addMethod("GET", new apigw.LambdaIntegration(this.healthFn));

        this.url = api.url;
        new CfnOutput(this, "ApiUrl", { value: this.url });
    }
}
