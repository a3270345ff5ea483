import Ajv, { ValidateFunction } from "ajv";
import { ProtocolContractViolation } from "../errors";
import { RpcMethod, RpcResultMap } from "../tl/types";
import rpcResultsSchema from "./schemas/rpc-results.schema.json";

const ajv = new Ajv({ allErrors: true, strict: false });
ajv.addSchema(rpcResultsSchema);

type ResultValidators = { [M in RpcMethod]: ValidateFunction<RpcResultMap[M]> };

const validators: ResultValidators = {
  "messages.getDialogs": ajv.compile<RpcResultMap["messages.getDialogs"]>({ $ref: "rpc-results#/definitions/dialogs" }),
  "messages.deleteHistory": ajv.compile<RpcResultMap["messages.deleteHistory"]>({
    $ref: "rpc-results#/definitions/affectedHistory",
  }),
  "messages.deleteChatUser": ajv.compile<RpcResultMap["messages.deleteChatUser"]>({
    $ref: "rpc-results#/definitions/updates",
  }),
  "channels.leaveChannel": ajv.compile<RpcResultMap["channels.leaveChannel"]>({
    $ref: "rpc-results#/definitions/updates",
  }),
};

function validatorFor<M extends RpcMethod>(method: M): ValidateFunction<RpcResultMap[M]> {
  return validators[method];
}

/**
 * Checks an untyped gateway payload against the result schema of `method`.
 * A payload outside the schema means the remote side answered with a shape
 * this package does not know, which is a contract violation rather than a
 * transport failure.
 */
export function parseRpcResult<M extends RpcMethod>(method: M, payload: unknown): RpcResultMap[M] {
  const validate = validatorFor(method);
  if (validate(payload)) return payload;
  const message = validate.errors?.map((e) => `${e.instancePath || e.schemaPath}: ${e.message}`).join("; ");
  throw new ProtocolContractViolation(`${method} returned an unexpected payload: ${message}`);
}
