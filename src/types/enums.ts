/**
 * Risk levels for alerts
 */
export enum RiskLevel {
  INFO = 'info',
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
}

/**
 * Confidence levels for alerts
 */
export enum ConfidenceLevel {
  FALSE_POSITIVE = 'false-positive',
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CONFIRMED = 'confirmed',
}

/**
 * How exhaustive an active detector's probing may be
 */
export enum AttackStrength {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  INSANE = 'insane',
}

/**
 * How much evidence a detector needs before it raises an alert.
 * OFF disables the detector.
 */
export enum AlertThreshold {
  OFF = 'off',
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
}

/**
 * Detector categories
 */
export enum DetectorCategory {
  INFO_GATHER = 'info-gathering',
  BROWSER = 'browser',
  SERVER = 'server',
  MISC = 'misc',
  INJECTION = 'injection',
}

/**
 * Detector types
 */
export enum DetectorType {
  PASSIVE = 'passive',
  ACTIVE = 'active',
}

/**
 * Technologies a target may declare
 */
export enum Technology {
  PHP = 'php',
  ASP = 'asp',
  ASP_NET = 'asp.net',
  JSP_SERVLET = 'jsp-servlet',
  NODE = 'node',
  PYTHON = 'python',
  RUBY = 'ruby',
  APACHE = 'apache',
  IIS = 'iis',
  NGINX = 'nginx',
  TOMCAT = 'tomcat',
  MYSQL = 'mysql',
  POSTGRESQL = 'postgresql',
  MSSQL = 'mssql',
  WINDOWS = 'windows',
  LINUX = 'linux',
}

/**
 * Who originated a transaction
 */
export enum Initiator {
  PROXY = 'proxy',
  ACTIVE_SCANNER = 'active-scanner',
  MANUAL_REQUEST = 'manual-request',
  AUTHENTICATION = 'authentication',
}

/**
 * Scan status
 */
export enum ScanStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

/**
 * Report formats
 */
export enum ReportFormat {
  JSON = 'json',
  HTML = 'html',
  SARIF = 'sarif',
  CONSOLE = 'console',
}

const RISK_ORDER: readonly RiskLevel[] = [RiskLevel.INFO, RiskLevel.LOW, RiskLevel.MEDIUM, RiskLevel.HIGH];

const STRENGTH_ORDER: readonly AttackStrength[] = [
  AttackStrength.LOW,
  AttackStrength.MEDIUM,
  AttackStrength.HIGH,
  AttackStrength.INSANE,
];

const THRESHOLD_ORDER: readonly AlertThreshold[] = [
  AlertThreshold.OFF,
  AlertThreshold.LOW,
  AlertThreshold.MEDIUM,
  AlertThreshold.HIGH,
];

export function compareRisk(a: RiskLevel, b: RiskLevel): number {
  return RISK_ORDER.indexOf(a) - RISK_ORDER.indexOf(b);
}

export function isStrengthAtLeast(strength: AttackStrength, minimum: AttackStrength): boolean {
  return STRENGTH_ORDER.indexOf(strength) >= STRENGTH_ORDER.indexOf(minimum);
}

export function isThresholdAtMost(threshold: AlertThreshold, maximum: AlertThreshold): boolean {
  return THRESHOLD_ORDER.indexOf(threshold) <= THRESHOLD_ORDER.indexOf(maximum);
}
