export const AGENT_INTENTS = [
  'unknown',
  'contact_management',
  'interaction_analysis',
  'scheduling_and_tasks',
  'communication',
  'market_intelligence',
  'general_inquiry',
  'data_analysis',
  'report_generation',
  'workflow_automation',
  'business_intelligence',
  'intent_classification',
  'resource_management',
  'service_provider_recommendation',
] as const;

export type AgentIntent = (typeof AGENT_INTENTS)[number];

export const FALLBACK_INTENT: AgentIntent = 'general_inquiry';

export const URGENCY_LEVELS = ['low', 'medium', 'high', 'critical'] as const;
export type UrgencyLevel = (typeof URGENCY_LEVELS)[number];

export const ORCHESTRATION_METHODS = ['custom', 'foundry_workflow', 'connected_agent'] as const;
export type OrchestrationMethod = (typeof ORCHESTRATION_METHODS)[number];

export const ACTION_SCOPES = ['inner_world', 'hybrid', 'real_world'] as const;
export type ActionScope = (typeof ACTION_SCOPES)[number];

// ---- Agents ----

export interface AgentPerformanceMetrics {
  successRate: number;
  averageResponseTimeMs: number;
  averageConfidence: number;
  totalRequests: number;
  successfulRequests: number;
  lastUpdated: Date;
}

export interface AgentCapability {
  agentId: string;
  agentName: string;
  version: string;
  description?: string;
  agentType: string;
  supportedIntents: AgentIntent[];
  supportedTasks: string[];
  supportedIndustries: string[];
  requiredPermissions: string[];
  isActive: boolean;
  maxConcurrentRequests?: number;
  performanceMetrics: AgentPerformanceMetrics;
}

export type AgentCapabilityInput = Omit<AgentCapability, 'agentId' | 'performanceMetrics'> & {
  agentId?: string;
  performanceMetrics?: Partial<AgentPerformanceMetrics>;
};

export type AgentHealthState = 'registered' | 'healthy' | 'unhealthy' | 'inactive';

export interface AgentHealthStatus {
  agentId: string;
  isHealthy: boolean;
  status: AgentHealthState;
  lastChecked: Date;
  responseTimeMs: number;
  errorMessage?: string;
}

export interface CapabilityValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface AgentTask {
  id: string;
  traceId: string;
  type: AgentIntent;
  description: string;
  conversationId?: string;
  interactionId?: string;
  context: Record<string, unknown>;
  urgency: UrgencyLevel;
  sourceAgentId?: string;
  userId?: string;
  industry?: string;
  createdAt: Date;
}

export interface AgentTaskResult {
  success: boolean;
  content: string;
  confidence: number;
  errorMessage?: string;
  data?: Record<string, unknown>;
  requiresFollowUp?: boolean;
  nextIntent?: AgentIntent;
  actions?: AgentAction[];
}

export interface AgentHandle {
  executeTask(task: AgentTask, signal?: AbortSignal): Promise<AgentTaskResult>;
  checkHealth?(signal?: AbortSignal): Promise<boolean>;
}

// ---- Requests & workflows ----

export interface AgentRequest {
  id: string;
  traceId: string;
  intent: AgentIntent;
  originalUserInput: string;
  conversationId?: string;
  interactionId?: string;
  context: Record<string, unknown>;
  urgency: UrgencyLevel;
  orchestrationMethod?: OrchestrationMethod;
  sourceAgentId?: string;
  userId?: string;
  industry?: string;
  createdAt: Date;
}

export type ResponseErrorKind = 'not_found' | 'timeout' | 'internal' | 'cancelled';

export interface AgentResponse {
  id: string;
  requestId: string;
  traceId: string;
  success: boolean;
  content: string;
  errorMessage?: string;
  errorKind?: ResponseErrorKind;
  retryable: boolean;
  confidence: number;
  processingTimeMs: number;
  agentId?: string;
  agentType?: string;
  requiresFollowUp: boolean;
  nextIntent?: AgentIntent;
  data: Record<string, unknown>;
  actions: AgentAction[];
  orchestrationMethod: OrchestrationMethod;
  createdAt: Date;
}

export type WorkflowStatus = 'processing' | 'completed' | 'error';

export interface WorkflowStep {
  stepName: string;
  requestId: string;
  agentId: string;
  intent: AgentIntent;
  isCompleted: boolean;
  result?: string;
  errorMessage?: string;
  startedAt: Date;
  completedAt: Date;
}

export interface WorkflowState {
  workflowId: string;
  traceId: string;
  currentState: WorkflowStatus;
  orchestrationMethod: OrchestrationMethod;
  pendingRequests: AgentRequest[];
  completedResponses: AgentResponse[];
  executionHistory: WorkflowStep[];
  isCompleted: boolean;
  hopCount: number;
  errorMessage?: string;
  startedAt: Date;
  completedAt?: Date;
}

// ---- Agent actions ----

export type FollowUpChannel = 'email' | 'phone' | 'sms' | 'meeting';

export type AgentActionPayload =
  | { kind: 'recommendation'; title: string; rationale?: string }
  | { kind: 'resource_assignment'; resourceId: string; assigneeId: string; notes?: string }
  | { kind: 'scheduled_follow_up'; channel: FollowUpChannel; dueAt: Date };

export interface AgentAction {
  id: string;
  actionType: string;
  description: string;
  priority: number;
  confidenceScore: number;
  validationReason: string;
  requiresApproval: boolean;
  approvalRequestId: string;
  parameters: Record<string, unknown>;
  suggestedTiming?: Date;
  traceId: string;
  actionScope: ActionScope;
  agentType: string;
  payload: AgentActionPayload;
}

export type ScheduledActionStatus =
  | 'pending'
  | 'approved'
  | 'rejected'
  | 'deferred'
  | 'suppressed'
  | 'executed'
  | 'expired';

export interface ScheduledAction {
  id: string;
  actionType: string;
  description: string;
  contactId: string;
  organizationId: string;
  scheduledByAgentId: string;
  scheduledAt: Date;
  executeAt: Date;
  expiresAt?: Date;
  parameters: Record<string, unknown>;
  relevanceCriteria: Record<string, unknown>;
  status: ScheduledActionStatus;
  priority: number;
  traceId?: string;
  actionScope: ActionScope;
}

export interface ContactContext {
  contactId: string;
  organizationId: string;
  contactName?: string;
  contactStatus?: string;
  relationshipStage?: string;
  dealStatus?: string;
  engagementLevel?: string;
  sentimentScore?: number;
  lastInteractionAt?: Date;
  interactionSummary?: string;
  customProperties: Record<string, unknown>;
  retrievedAt: Date;
}

// ---- Relevance validation ----

export type TierVerdict = 'relevant' | 'stale' | 'inconclusive';

export type ValidationMethod = 'rule_based' | 'contextual' | 'llm' | 'default' | 'error';

export interface TierOutcome {
  tier: 1 | 2 | 3;
  verdict: TierVerdict;
  confidence: number;
  reasoning: string;
  failedCriteria: string[];
}

export interface LlmRelevanceVerdict {
  isRelevant: boolean;
  confidence: number;
  reasoning: string;
  recommendedAction?: string;
  alternativeActions: string[];
}

export interface ActionRelevanceRequest {
  action: ScheduledAction;
  currentContext?: ContactContext;
  useLlmValidation?: boolean;
  userOverrides?: Record<string, unknown>;
  traceId?: string;
}

export interface ActionRelevanceResult {
  actionId: string;
  actionType: string;
  contactId: string;
  isRelevant: boolean;
  confidenceScore: number;
  reasoning: string;
  validationMethod: ValidationMethod;
  tiersRun: number[];
  failedCriteria: string[];
  alternatives: ScheduledAction[];
  recommendedAction?: string;
  traceId?: string;
  evaluatedAt: Date;
}

export interface ScopeValidationSettings {
  maxTier: 1 | 2 | 3;
  minConfidence: number;
  runAllTiers: boolean;
}

export type ApprovalMode = 'always_ask' | 'never_ask' | 'risk_based' | 'llm_decision';

export interface ApprovalConfig {
  overrideMode: ApprovalMode;
  userApprovalThreshold: number;
  userApprovalTimeoutMinutes: number;
  alwaysRequireApprovalActions: string[];
  neverRequireApprovalActions: string[];
  enableBulkApproval: boolean;
}

export interface ActionRelevanceConfig {
  enableLlmValidation: boolean;
  maxContextAgeMinutes: number;
  llmTimeoutMs: number;
  defaultActionOnUncertainty: 'suppress' | 'allow';
  enableAuditLogging: boolean;
  maxAuditEntries: number;
  batchConcurrency: number;
  negativeSentimentThreshold: number;
  recentInteractionDays: number;
  closedContactStatuses: string[];
  scopes: Record<ActionScope, ScopeValidationSettings>;
  approval: ApprovalConfig;
}

export interface AuditLogQuery {
  contactId?: string;
  startDate?: Date;
  endDate?: Date;
  actionType?: string;
}

// ---- Approvals ----

export type ApprovalStatus = 'pending' | 'approved' | 'rejected' | 'modified' | 'deferred' | 'expired';
export type ApprovalDecision = 'approve' | 'reject' | 'modify' | 'defer';

export interface UserApprovalRequest {
  id: string;
  actionId: string;
  action: ScheduledAction;
  userId: string;
  reason: string;
  relevance: ActionRelevanceResult;
  alternatives: ScheduledAction[];
  userOverrides: Record<string, unknown>;
  status: ApprovalStatus;
  traceId?: string;
  createdAt: Date;
  expiresAt: Date;
  respondedAt?: Date;
}

export interface ActionModification {
  description?: string;
  executeAt?: Date;
  priority?: number;
  parameters?: Record<string, unknown>;
}

export interface UserApprovalResponse {
  approvalRequestId: string;
  userId: string;
  decision: ApprovalDecision;
  modifications?: ActionModification;
  applyToSimilar?: boolean;
  comment?: string;
}

// ---- Compliance ----

export type ViolationSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ComplianceViolation {
  violationType: string;
  agentType: string;
  actionType: string;
  description: string;
  traceId: string;
  severity: ViolationSeverity;
  occurredAt: Date;
}

export interface ComplianceValidationResult {
  traceId: string;
  totalActions: number;
  validatedActions: number;
  unvalidatedActions: number;
  violations: string[];
  isCompliant: boolean;
  checkedAt: Date;
}

export interface ComplianceAuditReport {
  start: Date;
  end: Date;
  totalChecks: number;
  compliantChecks: number;
  totalActions: number;
  unvalidatedActions: number;
  complianceRate: number;
  violationsByAgentType: Record<string, number>;
  violationsByType: Record<string, number>;
}

// ---- External collaborators ----

export interface TextCompletion {
  complete(systemPrompt: string, userPrompt: string, conversationId?: string, signal?: AbortSignal): Promise<string>;
}

export interface ContactContextLookup {
  getContactContext(contactId: string, organizationId: string, signal?: AbortSignal): Promise<ContactContext | undefined>;
}

export type AuditEntry =
  | { kind: 'action_validation'; traceId?: string; result: ActionRelevanceResult; recordedAt: Date }
  | { kind: 'compliance_violation'; traceId: string; violation: ComplianceViolation; recordedAt: Date };

export interface AuditSink {
  record(entry: AuditEntry): Promise<void>;
}

// ---- Monitoring ----

export interface Metric {
  name: string;
  value: number;
  labels: Record<string, string>;
  timestamp: Date;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  agentId?: string;
  traceId?: string;
  metadata?: Record<string, unknown>;
}

const intentSet: ReadonlySet<string> = new Set<string>(AGENT_INTENTS);
const urgencySet: ReadonlySet<string> = new Set<string>(URGENCY_LEVELS);
const methodSet: ReadonlySet<string> = new Set<string>(ORCHESTRATION_METHODS);
const scopeSet: ReadonlySet<string> = new Set<string>(ACTION_SCOPES);

export function isAgentIntent(value: unknown): value is AgentIntent {
  return typeof value === 'string' && intentSet.has(value);
}

export function isUrgencyLevel(value: unknown): value is UrgencyLevel {
  return typeof value === 'string' && urgencySet.has(value);
}

export function isOrchestrationMethod(value: unknown): value is OrchestrationMethod {
  return typeof value === 'string' && methodSet.has(value);
}

export function isActionScope(value: unknown): value is ActionScope {
  return typeof value === 'string' && scopeSet.has(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
