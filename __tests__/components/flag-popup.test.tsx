// @vitest-environment jsdom
import React from "react";
import { act, fireEvent, render, screen } from "@testing-library/react";
import { FlagPopup, FlagPopupHost } from "@/components/social/flag-popup";
import { apiFetch, type CtfResult } from "@/lib/api-client";

const award: CtfResult = {
  vulnerability_detected: true,
  notification_type: "success",
  ctf_message: "XSS in Comment System bug found! +75 points",
  ctf_points_awarded: 75,
  ctf_total_points: 75,
  flag: "CTF{xss_comment_system_2}",
  bug_type: "Cross-Site Scripting (XSS)",
};

describe("FlagPopup", () => {
  it("shows the award and the flag", () => {
    render(<FlagPopup result={award} onClose={() => {}} />);
    expect(screen.getByRole("dialog", { name: "Cross-Site Scripting (XSS)" })).toBeInTheDocument();
    expect(screen.getByText("Total: 75 points")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "CTF{xss_comment_system_2}" })).toBeInTheDocument();
  });

  it("omits the flag button for repeat finds", () => {
    render(<FlagPopup result={{ ...award, notification_type: "info", flag: null }} onClose={() => {}} />);
    expect(screen.queryByRole("button", { name: /CTF\{/ })).not.toBeInTheDocument();
  });
});

describe("FlagPopupHost", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("opens when an API call returns a CTF body and closes on demand", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify(award), { status: 200 }))
    );
    render(<FlagPopupHost />);
    expect(screen.queryByRole("dialog")).not.toBeInTheDocument();

    await act(async () => {
      await apiFetch("/api/comments", { method: "POST", body: JSON.stringify({ post: 1, text: "<script>" }) });
    });
    expect(screen.getByRole("dialog", { name: "Cross-Site Scripting (XSS)" })).toBeInTheDocument();

    fireEvent.click(screen.getByRole("button", { name: "Close" }));
    expect(screen.queryByRole("dialog")).not.toBeInTheDocument();
  });
});
