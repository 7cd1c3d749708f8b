/**
 * PowerShell program run by the detached session server.
 *
 * It owns one duplex named pipe and answers one line per request line until
 * the client disconnects. Requests are base64 UTF-8 scripts; responses are
 * base64 UTF-8 JSON `{stdout, stderr, exit_status}`.
 */
export function buildPipeServerScript(pipeName: string): string {
  if (!/^[A-Za-z0-9_-]+$/.test(pipeName)) {
    throw new RangeError(`Invalid pipe name: ${pipeName}`);
  }

  return `$ErrorActionPreference = 'Stop'

$pipeServer = New-Object System.IO.Pipes.NamedPipeServerStream('${pipeName}', [System.IO.Pipes.PipeDirection]::InOut)
$pipeReader = New-Object System.IO.StreamReader($pipeServer)
$pipeWriter = New-Object System.IO.StreamWriter($pipeServer)

$pipeServer.WaitForConnection()

while ($true) {
  $request = $pipeReader.ReadLine()
  if ($null -eq $request) { break }

  $command = [System.Text.Encoding]::UTF8.GetString([System.Convert]::FromBase64String($request))
  $scriptBlock = $ExecutionContext.InvokeCommand.NewScriptBlock($command)
  $global:LASTEXITCODE = 0
  try {
    $stdout = & $scriptBlock | Out-String
    $exitStatus = 0
    if ($global:LASTEXITCODE) { $exitStatus = [int]$global:LASTEXITCODE }
    $result = @{ 'stdout' = $stdout; 'stderr' = ''; 'exit_status' = $exitStatus }
  } catch {
    $stderr = $_ | Out-String
    $result = @{ 'stdout' = ''; 'stderr' = $stderr; 'exit_status' = 1 }
  }

  $resultJson = $result | ConvertTo-Json -Compress
  $pipeWriter.WriteLine([System.Convert]::ToBase64String([System.Text.Encoding]::UTF8.GetBytes($resultJson)))
  $pipeWriter.Flush()
}

$pipeServer.Dispose()
`;
}
