import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";

const mocks = vi.hoisted(() => {
  const apiKeys: string[] = [];
  return { send: vi.fn(), apiKeys };
});

vi.mock("resend", () => ({
  Resend: class {
    emails = { send: mocks.send };
    constructor(apiKey: string) {
      mocks.apiKeys.push(apiKey);
    }
  },
}));

import { EmailDestination, formatTextEmail } from "../notifications/email";
import { createDestination, fileOutputConfig } from "../notifications/factory";
import { checklistFileName, FileOutputDestination, formatFileTimestamp } from "../notifications/file-output";
import { escapeHtml, formatStepLine, getPriorityLabel, getSeverityEmoji } from "../notifications/format";
import { GenericWebhookDestination } from "../notifications/generic";
import { PAGERDUTY_EVENTS_URL, PagerDutyDestination, formatPagerDutyEvent } from "../notifications/pagerduty";
import { SlackDestination, formatChecklistMessage } from "../notifications/slack";
import { TeamsDestination, formatChecklistCard } from "../notifications/teams";
import { RetryableError } from "../utils/retry";
import { makeChecklist, makeWebhookConfig } from "./fixtures";

const mockFetch = vi.fn();
global.fetch = mockFetch;

function lastRequest(): { url: unknown; init: RequestInit; body: unknown } {
  const [url, init] = mockFetch.mock.calls[mockFetch.mock.calls.length - 1];
  return { url, init, body: JSON.parse(init.body) };
}

describe("format helpers", () => {
  it("labels priorities and severities", () => {
    expect(getPriorityLabel("CRITICAL")).toBe("[CRITICAL]");
    expect(getPriorityLabel("LOW")).toBe("[LOW]");
    expect(getSeverityEmoji("WARNING")).toBe("🟡");
    expect(getSeverityEmoji("INFO")).toBe("🔵");
  });

  it("formats a step line", () => {
    expect(formatStepLine(makeChecklist().steps[0])).toBe("1. [HIGH] Find the top memory consumers");
  });

  it("escapes HTML", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;"
    );
  });
});

describe("HTTP destinations", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    mockFetch.mockResolvedValue(new Response("ok", { status: 200 }));
  });

  it("posts the raw checklist with configured headers", async () => {
    const checklist = makeChecklist();
    const destination = new GenericWebhookDestination(
      makeWebhookConfig({ headers: { Authorization: "Bearer test-secret" } })
    );

    await destination.send(checklist);

    const { url, init, body } = lastRequest();
    expect(url).toBe("https://hooks.example.com/checklists");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(body).toEqual(checklist);
  });

  it("rejects a 5xx with a RetryableError carrying the status", async () => {
    mockFetch.mockResolvedValueOnce(new Response("boom", { status: 500 }));
    const destination = new GenericWebhookDestination(makeWebhookConfig({ name: "ops" }));

    const error = await destination.send(makeChecklist()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryableError);
    expect(error).toMatchObject({ statusCode: 500, message: "Webhook ops API error: 500 - boom" });
  });

  it("formats Slack blocks", () => {
    expect(formatChecklistMessage(makeChecklist())).toEqual({
      text: "🔴 [CRITICAL] High memory on web-01",
      blocks: [
        { type: "header", text: { type: "plain_text", text: "🔴 High memory on web-01", emoji: true } },
        { type: "section", text: { type: "mrkdwn", text: "*Severity:* `CRITICAL`" } },
        {
          type: "section",
          text: { type: "mrkdwn", text: "*Summary*\nMemory pressure from a leaking worker" },
        },
        {
          type: "section",
          text: {
            type: "mrkdwn",
            text: [
              ":hammer_and_wrench: *Troubleshooting Checklist*",
              "1. [HIGH] Find the top memory consumers",
              "    `ps aux --sort=-%mem | head`",
              "2. [MEDIUM] Restart the worker",
            ].join("\n"),
          },
        },
        {
          type: "context",
          elements: [{ type: "mrkdwn", text: ":books: Runbooks: memory/high-memory.md" }],
        },
        {
          type: "context",
          elements: [{ type: "mrkdwn", text: "Alert ID: `alert-1` • Generated by ollama" }],
        },
      ],
    });
  });

  it("leaves out empty summary and runbooks in Slack", () => {
    const message = formatChecklistMessage(makeChecklist({ summary: "", sourceRunbooks: [] }));

    expect(message.blocks.map((block) => block.type)).toEqual([
      "header",
      "section",
      "section",
      "context",
    ]);
  });

  it("sends Slack messages to the webhook url", async () => {
    await new SlackDestination(
      makeWebhookConfig({ type: "slack", url: "https://hooks.slack.com/services/T0/B0/test" })
    ).send(makeChecklist());

    const { url, body } = lastRequest();
    expect(url).toBe("https://hooks.slack.com/services/T0/B0/test");
    expect(body).toMatchObject({ text: "🔴 [CRITICAL] High memory on web-01" });
  });

  it("formats a Teams adaptive card", () => {
    const message = formatChecklistCard(makeChecklist());
    const [attachment] = message.attachments;
    const body = attachment.content.body;

    expect(attachment.contentType).toBe("application/vnd.microsoft.card.adaptive");
    expect(body[0]).toMatchObject({ text: "🔴 Alert: High memory on web-01" });
    expect(body[1]).toMatchObject({ text: "CRITICAL", color: "attention" });
    expect(body[5]).toMatchObject({
      text: "1. [HIGH] Find the top memory consumers\n\n2. [MEDIUM] Restart the worker",
    });
    expect(body[6].facts).toEqual([
      { title: "Alert ID", value: "alert-1" },
      { title: "Generated by", value: "ollama" },
      { title: "Runbooks", value: "memory/high-memory.md" },
    ]);
  });

  it("sends Teams cards to the webhook url", async () => {
    await new TeamsDestination(makeWebhookConfig({ type: "teams" })).send(makeChecklist());

    expect(lastRequest().body).toMatchObject({ type: "message" });
  });

  it("triggers a PagerDuty event keyed by alert id", async () => {
    await new PagerDutyDestination(
      makeWebhookConfig({ type: "pagerduty", url: undefined, routingKey: "test-routing-key" })
    ).send(makeChecklist());

    const { url, body } = lastRequest();
    expect(url).toBe(PAGERDUTY_EVENTS_URL);
    expect(body).toEqual({
      routing_key: "test-routing-key",
      event_action: "trigger",
      dedup_key: "alert-1",
      payload: {
        summary: "High memory on web-01: Memory pressure from a leaking worker",
        source: "runbook-synthesizer",
        severity: "critical",
        timestamp: "2026-10-18T10:00:00.000Z",
        custom_details: {
          checklist: ["1. [HIGH] Find the top memory consumers", "2. [MEDIUM] Restart the worker"],
          source_runbooks: ["memory/high-memory.md"],
          llm_provider: "ollama",
        },
      },
    });
  });

  it("truncates long PagerDuty summaries", () => {
    const event = formatPagerDutyEvent(makeChecklist({ summary: "x".repeat(2000) }), "test-routing-key");

    expect(event.payload.summary).toHaveLength(1024);
    expect(event.payload.summary.endsWith("...")).toBe(true);
  });

  it("requires a url or routing key", () => {
    expect(() => new SlackDestination(makeWebhookConfig({ name: "s", url: undefined }))).toThrow(
      "Slack destination s requires a url"
    );
    expect(() => new PagerDutyDestination(makeWebhookConfig({ name: "p", type: "pagerduty" }))).toThrow(
      "PagerDuty destination p requires a routingKey"
    );
  });
});

describe("EmailDestination", () => {
  const emailConfig = makeWebhookConfig({
    name: "oncall-email",
    type: "email",
    url: undefined,
    to: ["oncall@example.com"],
    from: "alerts@example.com",
  });

  beforeEach(() => {
    mocks.send.mockReset();
    mocks.apiKeys.length = 0;
  });

  it("sends html and text bodies through Resend", async () => {
    mocks.send.mockResolvedValue({ data: { id: "email-1" }, error: null });
    const checklist = makeChecklist();

    await new EmailDestination(emailConfig, { apiKey: "test-secret" }).send(checklist);

    expect(mocks.apiKeys).toEqual(["test-secret"]);
    expect(mocks.send).toHaveBeenCalledWith({
      from: "alerts@example.com",
      to: ["oncall@example.com"],
      subject: "🔴 [CRITICAL] Checklist: High memory on web-01",
      html: expect.stringContaining("<strong>[HIGH]</strong> Find the top memory consumers"),
      text: formatTextEmail(checklist),
    });
  });

  it("escapes checklist text in the html body", async () => {
    mocks.send.mockResolvedValue({ data: { id: "email-2" }, error: null });

    await new EmailDestination(emailConfig, { apiKey: "test-secret" }).send(
      makeChecklist({ alertTitle: "<script>alert(1)</script>" })
    );

    const [{ html }] = mocks.send.mock.calls[0];
    expect(html).toContain("&lt;script&gt;alert(1)&lt;/script&gt;");
    expect(html).not.toContain("<script>");
  });

  it("formats the plain-text body", () => {
    expect(formatTextEmail(makeChecklist())).toBe(
      [
        "🔴 High memory on web-01",
        "=".repeat(50),
        "",
        "Severity: CRITICAL",
        "",
        "SUMMARY",
        "Memory pressure from a leaking worker",
        "",
        "TROUBLESHOOTING CHECKLIST",
        "1. [HIGH] Find the top memory consumers",
        "   $ ps aux --sort=-%mem | head",
        "2. [MEDIUM] Restart the worker",
        "",
        "---",
        "Alert ID: alert-1",
        "Runbooks: memory/high-memory.md",
      ].join("\n")
    );
  });

  it("marks Resend server errors as retryable", async () => {
    mocks.send.mockResolvedValue({
      data: null,
      error: { name: "internal_server_error", message: "try again" },
    });

    const error = await new EmailDestination(emailConfig, { apiKey: "test-secret" })
      .send(makeChecklist())
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryableError);
    expect(error).toMatchObject({ statusCode: 500, message: "Failed to send email: try again" });
  });

  it("fails other Resend errors without retry", async () => {
    mocks.send.mockResolvedValue({
      data: null,
      error: { name: "validation_error", message: "Invalid `to` field" },
    });

    const error = await new EmailDestination(emailConfig, { apiKey: "test-secret" })
      .send(makeChecklist())
      .catch((e: unknown) => e);

    expect(error).not.toBeInstanceOf(RetryableError);
    expect(error).toMatchObject({ message: "Failed to send email: Invalid `to` field" });
  });

  it("requires recipients and an api key", () => {
    expect(() => new EmailDestination({ ...emailConfig, to: [] }, { apiKey: "test-secret" })).toThrow(
      "Email destination oncall-email requires to and from"
    );
    expect(() => new EmailDestination(emailConfig)).toThrow(
      "Email destination oncall-email requires RESEND_API_KEY"
    );
  });
});

describe("FileOutputDestination", () => {
  let outputDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    outputDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), "checklists-")), "out");
  });

  afterEach(async () => {
    await fs.rm(path.dirname(outputDir), { recursive: true, force: true });
  });

  it("names files by alert id and generation time", () => {
    expect(formatFileTimestamp(new Date("2026-01-02T03:04:05.000Z"))).toBe("20260102-030405");
    expect(checklistFileName(makeChecklist())).toBe("checklist-alert-1-20261018-100000.json");
    expect(checklistFileName(makeChecklist({ alertId: "arn:aws/alarm x" }))).toBe(
      "checklist-arn_aws_alarm_x-20261018-100000.json"
    );
  });

  it("writes the checklist as JSON, creating the directory", async () => {
    const checklist = makeChecklist();

    await new FileOutputDestination(fileOutputConfig(outputDir)).send(checklist);

    const written = await fs.readFile(
      path.join(outputDir, "checklist-alert-1-20261018-100000.json"),
      "utf-8"
    );
    expect(JSON.parse(written)).toEqual(checklist);
  });
});

describe("createDestination", () => {
  it("builds the destination for each type", () => {
    expect(createDestination(makeWebhookConfig({ type: "generic" }))).toBeInstanceOf(
      GenericWebhookDestination
    );
    expect(createDestination(makeWebhookConfig({ type: "slack" }))).toBeInstanceOf(SlackDestination);
    expect(createDestination(makeWebhookConfig({ type: "teams" }))).toBeInstanceOf(TeamsDestination);
    expect(
      createDestination(makeWebhookConfig({ type: "pagerduty", routingKey: "test-routing-key" }))
    ).toBeInstanceOf(PagerDutyDestination);
    expect(
      createDestination(
        makeWebhookConfig({ type: "email", to: ["a@example.com"], from: "b@example.com" }),
        { resendApiKey: "test-secret" }
      )
    ).toBeInstanceOf(EmailDestination);
    expect(createDestination(fileOutputConfig("/tmp/checklists"))).toBeInstanceOf(FileOutputDestination);
  });

  it("gives the file destination no retries", () => {
    expect(fileOutputConfig("/tmp/checklists")).toMatchObject({
      name: "file-output",
      type: "file",
      url: "/tmp/checklists",
      retryCount: 0,
    });
  });
});
