import type { SchemaDocument, SchemaProperty } from "@docsynth/core";

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function constraintSummary(property: SchemaProperty): string {
  const { constraints } = property;
  if (!constraints) return "";

  const parts: string[] = [];
  if (constraints.enum) parts.push(`one of: ${constraints.enum.join(", ")}`);
  if (constraints.format) parts.push(`format: ${constraints.format}`);
  if (constraints.minimum !== undefined) parts.push(`min: ${constraints.minimum}`);
  if (constraints.maxLength !== undefined) {
    parts.push(`max length: ${constraints.maxLength}`);
  }
  if (constraints.maxItems !== undefined) {
    parts.push(`max items: ${constraints.maxItems}`);
  }
  if (constraints.filtering) parts.push(`filtering: ${constraints.filtering}`);
  if (constraints.sorting) parts.push(`sorting: ${constraints.sorting}`);
  return parts.join("; ");
}

function parameterTable(
  properties: Record<string, SchemaProperty>,
  requiredFields: readonly string[],
): string[] {
  const lines = [
    "| Name | Type | Required | Constraints | Description |",
    "| --- | --- | --- | --- | --- |",
  ];

  for (const [name, property] of Object.entries(properties)) {
    const required = requiredFields.includes(name) ? "yes" : "no";
    lines.push(
      `| \`${name}\` | ${property.type} | ${required} | ${escapeCell(constraintSummary(property))} | ${escapeCell(property.description)} |`,
    );
  }

  return lines;
}

function jsonBlock(value: unknown): string[] {
  return ["```json", JSON.stringify(value, null, 2), "```"];
}

/**
 * Human-readable page for one method.
 */
export function renderMarkdown(schema: SchemaDocument): string {
  const lines: string[] = [
    `# ${schema.title}`,
    "",
    `\`${schema.httpVerb.toUpperCase()} ${schema.path}\``,
    "",
    schema.description,
  ];

  if (schema.accessLevel) {
    lines.push("", `**Access:** ${schema.accessLevel}`);
  }

  if (schema.requestBody) {
    lines.push(
      "",
      "## Request parameters",
      "",
      ...parameterTable(
        schema.requestBody.properties,
        schema.requestBody.requiredFields,
      ),
    );
  }

  const data = schema.responses["200"]?.dataShape?.["data"];
  if (data?.properties) {
    lines.push(
      "",
      "## Response parameters",
      "",
      ...parameterTable(data.properties, data.required ?? []),
    );
  }

  const errorStatuses = Object.entries(schema.responses).filter(
    ([status]) => status !== "200" && status !== "400",
  );
  if (errorStatuses.length > 0 || schema.errorReferences?.length) {
    lines.push("", "## Errors", "");
    for (const [status, response] of errorStatuses) {
      lines.push(`- **${status}**: ${response.description}`);
    }
    for (const reference of schema.errorReferences ?? []) {
      lines.push(
        reference.href
          ? `- [${reference.text}](${reference.href})`
          : `- ${reference.text}`,
      );
    }
  }

  if (schema.examples?.request !== undefined) {
    lines.push("", "## Request example", "", ...jsonBlock(schema.examples.request));
  }
  if (schema.examples?.response !== undefined) {
    lines.push(
      "",
      "## Response example",
      "",
      ...jsonBlock(schema.examples.response),
    );
  }

  return `${lines.join("\n")}\n`;
}
