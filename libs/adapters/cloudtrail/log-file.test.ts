import { gzipSync } from "zlib";
import { parseCloudTrailLogFile, parseRecord } from "./log-file";
import { MalformedRecordError } from "../../archive/errors";

const file = JSON.stringify({
    Records: [
        { eventSource: "s3.amazonaws.com", eventName: "GetObject", requestID: "r1" },
        { eventSource: "ec2.amazonaws.com", eventName: "RunInstances", requestID: "r2" },
    ],
});

test("reads plain and gzipped log files", () => {
    expect(parseCloudTrailLogFile(Buffer.from(file))).toHaveLength(2);
    const records = parseCloudTrailLogFile(gzipSync(Buffer.from(file)));
    expect(records).toHaveLength(2);
    expect(records[1]).toEqual({ eventSource: "ec2.amazonaws.com", eventName: "RunInstances", requestID: "r2" });
});

test("a file without Records is rejected", () => {
    expect(() => parseCloudTrailLogFile(Buffer.from("{\"records\":[]}"))).toThrow("CloudTrail log file has no Records array");
});

test("parseRecord accepts a minimal record", () => {
    const rec = parseRecord({ eventName: "GetObject", requestID: "r1", requestParameters: null });
    expect(rec.requestID).toBe("r1");
});

test("parseRecord flags records without a request id or with wrong field types", () => {
    expect(() => parseRecord({ eventName: "GetObject" })).toThrow(MalformedRecordError);
    expect(() => parseRecord({ eventName: "GetObject", requestID: "" })).toThrow(MalformedRecordError);
    expect(() => parseRecord({ eventName: "GetObject", requestID: "r1", resources: "arn" })).toThrow(MalformedRecordError);
    expect(() => parseRecord("GetObject")).toThrow(MalformedRecordError);
});
