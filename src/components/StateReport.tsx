import React from "react";
import { Box, Text } from "ink";
import type { OrchestratorResult, StepResult } from "../lib/modules/orchestrator.js";
import { describeChanges } from "../lib/modules/result.js";

interface StateReportProps {
  run: OrchestratorResult;
  dryRun: boolean;
}

function resultLabel(result: boolean | null): { text: string; color: string } {
  if (result === true) return { text: "True", color: "green" };
  if (result === false) return { text: "False", color: "red" };
  return { text: "None", color: "yellow" };
}

function StepView({ step }: { step: StepResult }) {
  const { text, color } = resultLabel(step.result.result);
  const changes = describeChanges(step.result.changes);

  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text color={color}>ID: {step.id}</Text>
      <Text color="gray">Function: {step.state}</Text>
      <Text color={color}>Result: {text}</Text>
      <Text>Comment: {step.result.comment}</Text>
      {changes.length > 0 && (
        <Box flexDirection="column">
          <Text>Changes:</Text>
          {changes.map((line) => (
            <Text key={line} color="cyan">  {line}</Text>
          ))}
        </Box>
      )}
    </Box>
  );
}

export function StateReport({ run, dryRun }: StateReportProps) {
  const { summary } = run;

  if (run.steps.length === 0) {
    return (
      <Box paddingX={1}>
        <Text color="gray">No states declared.</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" paddingX={1}>
      {run.steps.map((step) => (
        <StepView key={step.id} step={step} />
      ))}
      <Box flexDirection="column">
        <Text bold>Summary{dryRun ? " (dry run)" : ""}</Text>
        <Text color="green">Succeeded: {summary.succeeded} (changed={summary.changed})</Text>
        {summary.pending > 0 && <Text color="yellow">Pending: {summary.pending}</Text>}
        <Text color={summary.failed > 0 ? "red" : "gray"}>Failed: {summary.failed}</Text>
        <Text color="gray">Total states run: {run.steps.length}</Text>
      </Box>
    </Box>
  );
}
