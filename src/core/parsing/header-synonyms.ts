// src/core/parsing/header-synonyms.ts
// Header cells are compared after normalizeHeader(): lower case, no accents,
// punctuation turned into spaces ("Tempo (min)" -> "tempo min").

export const COMPANY_HEADER_NAMES: ReadonlySet<string> = new Set([
    'empresa', 'cliente', 'cliente empresa', 'empresa cliente',
    'designacao', 'designacao social', 'nome cliente', 'cliente nome',
    'company', 'client', 'customer', 'company name', 'client name',
]);

export const TECHNICIAN_HEADER_NAMES: ReadonlySet<string> = new Set([
    'tecnico', 'tecnica', 'tecnico responsavel', 'responsavel', 'responsavel tecnico', 'colaborador',
    'technician', 'employee', 'staff', 'assignee', 'responsible',
]);

export const TIME_HEADER_NAMES: ReadonlySet<string> = new Set([
    'tempo', 'tempo m', 'tempo min', 'tempo minutos', 'minutos', 'total minutos',
    'horas', 'horas totais', 'duracao', 'duracao m', 'duracao minutos',
    'time', 'time spent', 'minutes', 'hours', 'duration', 'duration min',
]);

/** Non-indented first-column words in workload sheets that are headings, not companies */
export const WORKLOAD_HEADING_WORDS: ReadonlySet<string> = new Set([
    'EMPRESA', 'CLIENTE', 'COMPANY', 'CLIENT', 'TOTAL',
]);

/** Report titles repeated at the top of workload exports */
export const WORKLOAD_TITLE_FRAGMENTS: readonly string[] = [
    'MAPA DE TEMPO TRABALHADO',
    'TIME WORKED',
    'WORKLOAD REPORT',
];
