import { formatDiagnosticLine, PFCLI001, PFCLI002, PFCLI003, PFCLI005 } from '@pasfix/diagnostics'
import { FormatError } from '@pasfix/formatter'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatDiagnosticLine(PFCLI001, { path: filePath })
	}
	return formatDiagnosticLine(PFCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatDiagnosticLine(PFCLI003, { reason: getErrorMessage(error) })
}

export function formatFormatError(error: unknown): string {
	if (error instanceof FormatError) {
		return error.message
	}
	return formatDiagnosticLine(PFCLI005, { reason: getErrorMessage(error) })
}
