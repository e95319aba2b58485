export const GUIDE_SOURCE = [
  "Intro line before headings.",
  "",
  "# Guide",
  "",
  "Welcome text.",
  "",
  "## Key Concepts",
  "",
  "### Hooks",
  "",
  "Hooks let components use state.",
  "",
  "```tsx",
  "const [count, setCount] = useState(0);",
  "```",
  "",
  "## Routing",
  "Routes map URLs.",
].join("\n");

export const BROKEN_SOURCE = [
  "# Doc",
  "",
  "See [missing](#nowhere) and [ok](#setup).",
  "",
  "## Setup",
  "",
  "#### Deep",
  "",
  "## Setup",
  "",
  "```",
  "plain",
  "```",
].join("\n");
