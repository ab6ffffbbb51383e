import { Stack, StackProps, RemovalPolicy, Duration, CfnOutput } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as path from "path";
import * as dynamodb from "aws-cdk-lib/aws-dynamodb";
import * as lambda from "aws-cdk-lib/aws-lambda";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import * as triggers from "aws-cdk-lib/triggers";
import * as tags from "aws-cdk-lib";

export class DataStack extends Stack {
  public readonly guidelinesTable: dynamodb.Table;

  constructor(scope: Construct, id: string, props?: StackProps) {
    super(scope, id, props);

    // Guideline single-table: PK = DRUG#<drug>, SK = PHENOTYPE#<code>
    this.guidelinesTable = new dynamodb.Table(this, "GuidelinesTable", {
      tableName: "pgx-guidelines",
      partitionKey: { name: "PK", type: dynamodb.AttributeType.STRING },
      sortKey: { name: "SK", type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      pointInTimeRecoverySpecification: { pointInTimeRecoveryEnabled: true },
      removalPolicy: RemovalPolicy.DESTROY // dev only
    });

    const seedFn = new NodejsFunction(this, "SeedGuidelinesFn", {
      entry: path.join(process.cwd(), "services", "seed-guidelines", "src", "handler.ts"),
      handler: "handler",
      runtime: lambda.Runtime.NODEJS_20_X,
      memorySize: 256,
      timeout: Duration.minutes(2),
      bundling: { target: "node20", sourceMap: true, keepNames: true },
      environment: { GUIDELINES_TABLE: this.guidelinesTable.tableName }
    });
    this.guidelinesTable.grantWriteData(seedFn);

    // Re-seeds on every deploy that changes the function (bundled data included)
    new triggers.Trigger(this, "SeedGuidelines", {
      handler: seedFn,
      executeAfter: [this.guidelinesTable],
      executeOnHandlerChange: true
    });

    new CfnOutput(this, "GuidelinesTableName", { value: this.guidelinesTable.tableName });
    new CfnOutput(this, "GuidelinesTableArn", { value: this.guidelinesTable.tableArn });

    tags.Tags.of(this).add("project", "pgx-risk");
    tags.Tags.of(this).add("stack", "data");
    tags.Tags.of(this).add("env", this.node.tryGetContext("env") ?? "dev");
  }
}
