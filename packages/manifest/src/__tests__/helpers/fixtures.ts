/**
 * Manifest fixture documents for manifest tests.
 */

export const VALID_MINIMAL_JSON = JSON.stringify({
  name: "echo-tool",
  componentType: "tool",
  version: "1.0.0",
});

export const VALID_FULL_JSON = JSON.stringify(
  {
    name: "research-agent",
    componentType: "agent",
    version: "2.1.0-beta.1",
    description: "Searches and summarizes papers",
    author: "Test Author",
    tags: ["research", "search", "research"],
    dependencies: [
      { name: "web-search", versionConstraint: "^1.2.0" },
      { name: "pdf-reader", versionConstraint: ">=0.3.0 <1.0.0" },
    ],
    minLanguageVersion: "3.12",
    files: [
      { src: "agent.py", dest: "agents/research/agent.py" },
      { src: "__init__.py", dest: "agents/research/__init__.py" },
    ],
    templateVariables: ["class_name", "timeout"],
    templateDefaults: { timeout: "30" },
    environmentVariables: ["SEARCH_API_KEY"],
    postInstallMessage: "Set SEARCH_API_KEY before running.",
    homepage: "https://example.com/research-agent",
    maintainers: [{ name: "a" }, { name: "b" }],
  },
  null,
  2,
);

export const LEGACY_JSON = JSON.stringify({
  name: "legacy_agent",
  version: "0.4.1",
  type: "agent",
  description: "Manifest in the older snake_case layout",
  authors: [{ name: "Legacy Author", email: "author@example.com" }],
  license: "MIT",
  mirascope_version_min: "0.1.0",
  files_to_copy: [
    { source: "agent.py", destination: "agent.py" },
    { source: "__init__.py", destination: "__init__.py" },
  ],
  target_directory_key: "agents",
  registry_dependencies: ["base_tool", "formatter@^2.0.0"],
  environment_variables: ["API_KEY"],
  template_variables: [
    { name: "component_class_name", description: "Class name", default: "LegacyAgent" },
    { name: "api_timeout", description: "Timeout", default: 30 },
    { name: "region", description: "No default" },
  ],
  post_install_notes: "Run the agent with python -m agent",
});

export const VALID_MINIMAL_YAML = `
name: prompt-pack
componentType: prompt_template
version: 0.1.0
files:
  - src: prompt.txt
    dest: prompts/prompt.txt
templateVariables:
  - audience
`;
