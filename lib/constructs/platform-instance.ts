import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';

export interface PlatformInstanceProps {
  /** Physical name used for tags, e.g. `devops-platform-dev-jenkins` */
  readonly name: string;
  readonly vpc: ec2.IVpc;
  readonly securityGroup: ec2.ISecurityGroup;
  readonly instanceType: string;
  readonly userData: ec2.UserData;
  readonly description: string;
  /** Pinned image; the latest Amazon Linux 2023 is used when absent */
  readonly ami?: { readonly id: string; readonly region: string };
  readonly keyPairName?: string;
  /** Root volume size in GiB @default 30 */
  readonly rootVolumeSize?: number;
}

/**
 * An EC2 host of the platform: IMDSv2 only, encrypted gp3 root volume,
 * detailed monitoring and an instance role with Session Manager access.
 */
export class PlatformInstance extends Construct {
  public readonly instance: ec2.Instance;
  public readonly role: iam.Role;

  constructor(scope: Construct, id: string, props: PlatformInstanceProps) {
    super(scope, id);

    this.role = new iam.Role(this, 'Role', {
      assumedBy: new iam.ServicePrincipal('ec2.amazonaws.com'),
      description: `Instance role for the ${props.description}`,
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonSSMManagedInstanceCore'),
      ],
    });

    const machineImage = props.ami === undefined
      ? ec2.MachineImage.latestAmazonLinux2023()
      : ec2.MachineImage.genericLinux({ [props.ami.region]: props.ami.id });

    this.instance = new ec2.Instance(this, 'Instance', {
      vpc: props.vpc,
      vpcSubnets: { subnetType: ec2.SubnetType.PUBLIC },
      instanceType: new ec2.InstanceType(props.instanceType),
      machineImage,
      securityGroup: props.securityGroup,
      role: this.role,
      userData: props.userData,
      userDataCausesReplacement: true,
      requireImdsv2: true,
      detailedMonitoring: true,
      keyPair: props.keyPairName === undefined
        ? undefined
        : ec2.KeyPair.fromKeyPairName(this, 'KeyPair', props.keyPairName),
      blockDevices: [
        {
          deviceName: '/dev/xvda',
          volume: ec2.BlockDeviceVolume.ebs(props.rootVolumeSize ?? 30, {
            encrypted: true,
            volumeType: ec2.EbsDeviceVolumeType.GP3,
            deleteOnTermination: true,
          }),
        },
      ],
    });

    cdk.Tags.of(this.instance).add('Name', props.name);
  }
}
