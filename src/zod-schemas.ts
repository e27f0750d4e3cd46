// Fickle Zod Schemas
// Single source of truth for the program document handed over by the parser,
// and for the runtime configuration.
//
// Type interfaces are defined manually (not via z.infer) because recursive
// unions typed as z.ZodType erase inferred types to `unknown`. We define the
// types explicitly and annotate recursive schemas with z.ZodType<ExplicitType>.

import { z } from "zod/v4";

//==============================================================================
// Primitives
//==============================================================================

/** Semantic version pattern */
const SemVer = z.string().regex(/^\d+\.\d+\.\d+(-[a-zA-Z0-9.]+)?$/);

const Name = z.string().min(1);

export interface Span { line: number; column: number }

export const SpanSchema = z.object({
	line: z.number().int().min(1),
	column: z.number().int().min(1),
}).meta({ id: "Span", title: "Source Span", description: "1-based source position of a node" });

//==============================================================================
// Expression Domain - Manual Interfaces
//==============================================================================

export interface NumberExpr { kind: "number"; value: number; span?: Span | undefined }
export interface TextExpr { kind: "text"; value: string; span?: Span | undefined }
export interface BooleanExpr { kind: "boolean"; value: boolean; span?: Span | undefined }
export interface NullExpr { kind: "null"; span?: Span | undefined }
export interface ArrayExpr { kind: "array"; elements: Expr[]; span?: Span | undefined }
export interface RecordField { key: string; value: Expr }
export interface RecordExpr { kind: "record"; fields: RecordField[]; span?: Span | undefined }
export interface IdentifierExpr { kind: "identifier"; name: string; span?: Span | undefined }
export interface CallExpr { kind: "call"; callee: string; args: Expr[]; span?: Span | undefined }
export interface AwaitExpr { kind: "await"; value: Expr; span?: Span | undefined }

export type Expr =
	| NumberExpr | TextExpr | BooleanExpr | NullExpr
	| ArrayExpr | RecordExpr | IdentifierExpr | CallExpr | AwaitExpr;

//==============================================================================
// Statement Domain - Manual Interfaces
//==============================================================================

export interface LetStmt { kind: "let"; name: string; value: Expr; span?: Span | undefined }
export interface ExprStmt { kind: "expr"; expr: Expr; span?: Span | undefined }
export interface IfStmt { kind: "if"; cond: Expr; then: Stmt[]; else?: Stmt[] | undefined; span?: Span | undefined }
export interface LoopStmt { kind: "loop"; cond?: Expr | undefined; body: Stmt[]; span?: Span | undefined }
export interface FunctionStmt { kind: "function"; name: string; params: string[]; body: Stmt[]; async: boolean; span?: Span | undefined }
export interface ReturnStmt { kind: "return"; value?: Expr | undefined; span?: Span | undefined }
export interface BreakStmt { kind: "break"; span?: Span | undefined }
export interface TryStmt { kind: "try"; body: Stmt[]; param: string; handler: Stmt[]; span?: Span | undefined }
export interface DirectiveStmt { kind: "directive"; name: string; span?: Span | undefined }

export type Stmt =
	| LetStmt | ExprStmt | IfStmt | LoopStmt | FunctionStmt
	| ReturnStmt | BreakStmt | TryStmt | DirectiveStmt;

export interface Program { version: string; body: Stmt[] }

//==============================================================================
// Zod Schemas - Expression Domain (9 variants)
//==============================================================================

export const NumberExprSchema: z.ZodType<NumberExpr> = z.object({
	kind: z.literal("number"),
	value: z.number(),
	span: SpanSchema.optional(),
}).meta({ id: "NumberExpr", title: "Number Literal" });

export const TextExprSchema: z.ZodType<TextExpr> = z.object({
	kind: z.literal("text"),
	value: z.string(),
	span: SpanSchema.optional(),
}).meta({ id: "TextExpr", title: "Text Literal" });

export const BooleanExprSchema: z.ZodType<BooleanExpr> = z.object({
	kind: z.literal("boolean"),
	value: z.boolean(),
	span: SpanSchema.optional(),
}).meta({ id: "BooleanExpr", title: "Boolean Literal" });

export const NullExprSchema: z.ZodType<NullExpr> = z.object({
	kind: z.literal("null"),
	span: SpanSchema.optional(),
}).meta({ id: "NullExpr", title: "Null Literal" });

export const ArrayExprSchema: z.ZodType<ArrayExpr> = z.object({
	kind: z.literal("array"),
	get elements() { return z.array(ExprSchema); },
	span: SpanSchema.optional(),
}).meta({ id: "ArrayExpr", title: "Array Literal", description: "Ordered elements, each evaluated left to right" });

export const RecordFieldSchema: z.ZodType<RecordField> = z.object({
	key: z.string(),
	get value() { return ExprSchema; },
}).meta({ id: "RecordField", title: "Record Field" });

export const RecordExprSchema: z.ZodType<RecordExpr> = z.object({
	kind: z.literal("record"),
	get fields() { return z.array(RecordFieldSchema); },
	span: SpanSchema.optional(),
}).meta({ id: "RecordExpr", title: "Record Literal", description: "Text-keyed fields in insertion order" });

export const IdentifierExprSchema: z.ZodType<IdentifierExpr> = z.object({
	kind: z.literal("identifier"),
	name: Name,
	span: SpanSchema.optional(),
}).meta({ id: "IdentifierExpr", title: "Identifier", description: "Variable reference resolved through the scope chain" });

export const CallExprSchema: z.ZodType<CallExpr> = z.object({
	kind: z.literal("call"),
	callee: Name,
	get args() { return z.array(ExprSchema); },
	span: SpanSchema.optional(),
}).meta({ id: "CallExpr", title: "Call Expression", description: "Call of a built-in or a user function by name" });

export const AwaitExprSchema: z.ZodType<AwaitExpr> = z.object({
	kind: z.literal("await"),
	get value() { return ExprSchema; },
	span: SpanSchema.optional(),
}).meta({ id: "AwaitExpr", title: "Await Expression", description: "Suspends the current task until a promise settles" });

/** Union of all expression variants. Uses z.union (not discriminatedUnion) due to recursion. */
export const ExprSchema: z.ZodType<Expr> = z.union([
	NumberExprSchema,
	TextExprSchema,
	BooleanExprSchema,
	NullExprSchema,
	ArrayExprSchema,
	RecordExprSchema,
	IdentifierExprSchema,
	CallExprSchema,
	AwaitExprSchema,
]).meta({ id: "Expr", title: "Expression" });

//==============================================================================
// Zod Schemas - Statement Domain (9 variants)
//==============================================================================

const block = (): z.ZodType<Stmt[]> => z.array(StmtSchema);

export const LetStmtSchema: z.ZodType<LetStmt> = z.object({
	kind: z.literal("let"),
	name: Name,
	get value() { return ExprSchema; },
	span: SpanSchema.optional(),
}).meta({ id: "LetStmt", title: "Let Declaration" });

export const ExprStmtSchema: z.ZodType<ExprStmt> = z.object({
	kind: z.literal("expr"),
	get expr() { return ExprSchema; },
	span: SpanSchema.optional(),
}).meta({ id: "ExprStmt", title: "Expression Statement" });

export const IfStmtSchema: z.ZodType<IfStmt> = z.object({
	kind: z.literal("if"),
	get cond() { return ExprSchema; },
	get then() { return block(); },
	get else() { return block().optional(); },
	span: SpanSchema.optional(),
}).meta({ id: "IfStmt", title: "If Statement", description: "Runs the else branch when there is one; otherwise nothing" });

export const LoopStmtSchema: z.ZodType<LoopStmt> = z.object({
	kind: z.literal("loop"),
	get cond() { return ExprSchema.optional(); },
	get body() { return block(); },
	span: SpanSchema.optional(),
}).meta({ id: "LoopStmt", title: "Loop Statement", description: "Body runs exactly once; the condition is evaluated and ignored" });

export const FunctionStmtSchema: z.ZodType<FunctionStmt> = z.object({
	kind: z.literal("function"),
	name: Name,
	params: z.array(Name),
	get body() { return block(); },
	async: z.boolean(),
	span: SpanSchema.optional(),
}).meta({ id: "FunctionStmt", title: "Function Declaration" });

export const ReturnStmtSchema: z.ZodType<ReturnStmt> = z.object({
	kind: z.literal("return"),
	get value() { return ExprSchema.optional(); },
	span: SpanSchema.optional(),
}).meta({ id: "ReturnStmt", title: "Return Statement" });

export const BreakStmtSchema: z.ZodType<BreakStmt> = z.object({
	kind: z.literal("break"),
	span: SpanSchema.optional(),
}).meta({ id: "BreakStmt", title: "Break Statement" });

export const TryStmtSchema: z.ZodType<TryStmt> = z.object({
	kind: z.literal("try"),
	get body() { return block(); },
	param: Name,
	get handler() { return block(); },
	span: SpanSchema.optional(),
}).meta({ id: "TryStmt", title: "Try/Catch Statement", description: "Catches every non-fatal error raised by the body" });

export const DirectiveStmtSchema: z.ZodType<DirectiveStmt> = z.object({
	kind: z.literal("directive"),
	name: Name,
	span: SpanSchema.optional(),
}).meta({ id: "DirectiveStmt", title: "Directive", description: "Runtime switch such as disable_useless" });

export const StmtSchema: z.ZodType<Stmt> = z.union([
	LetStmtSchema,
	ExprStmtSchema,
	IfStmtSchema,
	LoopStmtSchema,
	FunctionStmtSchema,
	ReturnStmtSchema,
	BreakStmtSchema,
	TryStmtSchema,
	DirectiveStmtSchema,
]).meta({ id: "Stmt", title: "Statement" });

export const ProgramSchema: z.ZodType<Program> = z.object({
	version: SemVer,
	get body() { return block(); },
}).meta({ id: "Program", title: "Fickle Program", description: "Ordered top-level statements" });

//==============================================================================
// Runtime Configuration
//==============================================================================

/** Seeds are the 32-bit state of the RNG. */
export const SEED_MIN = -(2 ** 31);
export const SEED_MAX = 2 ** 31 - 1;

export const RuntimeConfigSchema = z.object({
	/** Absent: seeded from a high-entropy source. */
	seed: z.number().int().min(SEED_MIN).max(SEED_MAX).optional(),
	/** Virtual milliseconds advanced per scheduler tick. */
	tickMs: z.number().int().min(1).default(100),
	/** Timeout of `promise(v)` when none is given. */
	defaultTimeoutMs: z.number().int().min(0).default(1000),
	mindChange: z.boolean().default(true),
	maxSteps: z.number().int().min(1).default(100_000),
	trace: z.boolean().default(false),
}).meta({ id: "RuntimeConfig", title: "Runtime Configuration" });

export type RuntimeConfig = z.output<typeof RuntimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;
