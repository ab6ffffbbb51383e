import { Stack, StackProps, Duration } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as cw from "aws-cdk-lib/aws-cloudwatch";
import * as lambda from "aws-cdk-lib/aws-lambda";

export interface AlarmsStackProps extends StackProps {
  analyzeFn: lambda.IFunction;
  uploadUrlFn: lambda.IFunction;
  auditFn: lambda.IFunction;
  metricsNamespace?: string; // default "pgx.risk"
}

export class AlarmsStack extends Stack {
  constructor(scope: Construct, id: string, props: AlarmsStackProps) {
    super(scope, id, props);

    const NS = props.metricsNamespace ?? "pgx.risk";
    const sum = (metricName: string) =>
      new cw.Metric({ namespace: NS, metricName, dimensionsMap: { service: "analyze" }, period: Duration.minutes(1), statistic: "Sum" });

    // ---- Lambda error alarms
    const errAlarm = (fn: lambda.IFunction, name: string) => new cw.Alarm(this, `${name}-Errors-Alarm`, {
      metric: fn.metricErrors({ period: Duration.minutes(1), statistic: "Sum" }),
      threshold: 0,
      evaluationPeriods: 3,
      comparisonOperator: cw.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cw.TreatMissingData.NOT_BREACHING,
      alarmDescription: `${name} has errors`,
    });
    errAlarm(props.analyzeFn, "AnalyzeFn");
    errAlarm(props.uploadUrlFn, "UploadUrlFn");
    errAlarm(props.auditFn, "AuditFn");

    // ---- Analyze failure ratio > 5%
    const failed = sum("analyze_error_count");
    const succeeded = sum("analyze_success_count");
    const failedPct = new cw.MathExpression({
      expression: "IF((m1+m2)>0,(m1/(m1+m2))*100,0)",
      usingMetrics: { m1: failed, m2: succeeded },
      period: Duration.minutes(1),
    });
    new cw.Alarm(this, "AnalyzeFailedPct-Alarm", {
      metric: failedPct,
      threshold: 5,
      evaluationPeriods: 5,
      comparisonOperator: cw.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cw.TreatMissingData.NOT_BREACHING,
      alarmDescription: "Analyze failures > 5%",
    });

    // ---- Analyze p95 latency close to the API Gateway limit
    new cw.Alarm(this, "AnalyzeP95Duration-Alarm", {
      metric: props.analyzeFn.metricDuration({ statistic: "p95", period: Duration.minutes(5) }),
      threshold: 20_000,
      evaluationPeriods: 3,
      comparisonOperator: cw.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cw.TreatMissingData.NOT_BREACHING,
      alarmDescription: "Analyze p95 duration > 20s",
    });

    // ---- Dashboard
    const dash = new cw.Dashboard(this, "Dashboard", { dashboardName: "PgxRisk-Dashboard" });

    dash.addWidgets(
      new cw.GraphWidget({
        title: "Lambda Errors", left: [
          props.analyzeFn.metricErrors(),
          props.uploadUrlFn.metricErrors(),
          props.auditFn.metricErrors(),
        ], width: 12
      }),
      new cw.GraphWidget({
        title: "Lambda Duration (p95)", left: [
          props.analyzeFn.metricDuration({ statistic: "p95" }),
          props.uploadUrlFn.metricDuration({ statistic: "p95" }),
        ], width: 12
      }),
    );

    dash.addWidgets(
      new cw.GraphWidget({ title: "Analyze Failed %", left: [failedPct], width: 8 }),
      new cw.GraphWidget({
        title: "Analyze Outcomes", left: [succeeded, failed, sum("analyze_invalid_count")], width: 8
      }),
      new cw.GraphWidget({
        title: "Advisory Use / Bottlenecks / Unreadable VCF", left: [
          sum("advisory_used_count"),
          sum("bottleneck_count"),
          sum("vcf_unreadable_count"),
        ], width: 8
      }),
    );
  }
}
