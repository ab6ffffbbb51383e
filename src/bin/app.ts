import * as cdk from 'aws-cdk-lib';
import { DataStack } from '../stacks/data-stack';
import { StorageStack } from '../stacks/storage-stack';
import { AuditStack } from '../stacks/audit-stack';
import { ApiStack } from '../stacks/api-stack';
import { AlarmsStack } from '../stacks/alarms-stack';

const app = new cdk.App();

const env = {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION || 'eu-central-1',
};

// ── Foundations
const data = new DataStack(app, 'Pgx-Data', { env });
const storage = new StorageStack(app, 'Pgx-Storage', { env });

// ── Audit (shared function)
const audit = new AuditStack(app, 'Pgx-Audit', {
    env,
    auditBucket: storage.auditBucket,
});

// ── HTTP API
const api = new ApiStack(app, 'Pgx-Api', {
    env,
    uploadBucket: storage.uploadBucket,
    guidelinesTable: data.guidelinesTable,
    auditFn: audit.auditFn,
});

const alarms = new AlarmsStack(app, 'Pgx-Alarms', {
    env,
    analyzeFn: api.analyzeFn,
    uploadUrlFn: api.uploadUrlFn,
    auditFn: audit.auditFn,
});

// ── Explicit dependencies (only where not inferred by props):
audit.addDependency(storage);
api.addDependency(data);      // guidelines seeded before the API serves
api.addDependency(audit);
alarms.addDependency(api);
