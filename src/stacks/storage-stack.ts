import { Stack, StackProps, RemovalPolicy, CfnOutput, Duration } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as kms from "aws-cdk-lib/aws-kms";
import * as tags from "aws-cdk-lib";

export class StorageStack extends Stack {
  public readonly uploadBucket: s3.Bucket;
  public readonly auditBucket: s3.Bucket;
  public readonly storageKey: kms.Key;

  constructor(scope: Construct, id: string, props?: StackProps) {
    super(scope, id, props);

    this.storageKey = new kms.Key(this, "StorageKey", {
      alias: "alias/pgx-storage-key",
      enableKeyRotation: true,
      removalPolicy: RemovalPolicy.DESTROY
    });

    // VCF uploads; presigned PUTs from the browser, read once by /analyze
    this.uploadBucket = new s3.Bucket(this, "UploadBucket", {
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.KMS,
      encryptionKey: this.storageKey,
      enforceSSL: true,
      objectOwnership: s3.ObjectOwnership.BUCKET_OWNER_ENFORCED,
      cors: [{
        allowedMethods: [s3.HttpMethods.PUT],
        allowedOrigins: ["*"],
        allowedHeaders: ["Content-Type"],
        maxAge: 3000
      }],
      removalPolicy: RemovalPolicy.DESTROY, // dev
      autoDeleteObjects: true // dev convenience
    });

    // Genotype data is not kept: uploads expire after a day
    this.uploadBucket.addLifecycleRule({
      prefix: "uploads/",
      expiration: Duration.days(1),
      abortIncompleteMultipartUploadAfter: Duration.days(1)
    });

    this.auditBucket = new s3.Bucket(this, "AuditBucket", {
      bucketName: `${Stack.of(this).stackName.toLowerCase()}-audit-${this.account}-${this.region}`.slice(0, 63),
      encryptionKey: this.storageKey,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true
    });

    new CfnOutput(this, "UploadBucketName", { value: this.uploadBucket.bucketName });
    new CfnOutput(this, "AuditBucketName", { value: this.auditBucket.bucketName });
    new CfnOutput(this, "StorageKeyArn", { value: this.storageKey.keyArn });

    tags.Tags.of(this).add("project", "pgx-risk");
    tags.Tags.of(this).add("stack", "storage");
    tags.Tags.of(this).add("env", this.node.tryGetContext("env") ?? "dev");
  }
}
