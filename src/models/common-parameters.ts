export const hostnameParameter = {
  type: "string" as const,
  description: "Hostname of the Mesos agent, as registered with the master",
};

export const ipParameter = {
  type: "string" as const,
  description: "IP of the Mesos agent (optional - defaults to the hostname)",
};

export const dryRunParameter = {
  type: "boolean" as const,
  description: "If true, only show the request that would be sent, don't actually send it",
  default: false,
};
